import { readFile } from 'fs/promises';
import { env } from '../config';
import { htmlToParagraphs } from '../extraction';
import { logger } from '../utils';
import type { DocumentConverter, DocumentSource } from './types';

export interface TikaConverterOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected in tests */
  fetchImpl?: typeof fetch;
}

/**
 * Converts documents (PDF and anything else Tika reads) by sending them to
 * an Apache Tika server and asking for XHTML back.
 */
export class TikaDocumentConverter implements DocumentConverter {
  public readonly name = 'tika';

  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TikaConverterOptions = {}) {
    const baseUrl = options.baseUrl ?? env.TIKA_URL;
    this.endpoint = `${baseUrl.replace(/\/+$/, '')}/tika`;
    this.timeoutMs = options.timeoutMs ?? env.TIKA_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async convert(source: DocumentSource): Promise<string[]> {
    const content = await readFile(source.filePath);

    logger.info(`Converting ${source.fileName} with Tika (${content.length} bytes)`);

    const response = await this.fetchImpl(this.endpoint, {
      method: 'PUT',
      headers: {
        Accept: 'text/html',
        'Content-Type': 'application/octet-stream',
      },
      body: new Uint8Array(content),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Tika responded with ${response.status} ${response.statusText}`);
    }

    return htmlToParagraphs(await response.text());
  }
}

export default TikaDocumentConverter;
