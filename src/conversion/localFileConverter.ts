import { readFile } from 'fs/promises';
import { extname } from 'path';
import { htmlToParagraphs, textToParagraphs } from '../extraction';
import type { DocumentConverter, DocumentSource } from './types';

export const HTML_EXTENSIONS = ['.html', '.htm', '.xhtml'] as const;
export const TEXT_EXTENSIONS = ['.txt'] as const;

/**
 * Reads documents that are already text: converted HTML kept from an earlier
 * run, or plain-text transcriptions with blank lines between paragraphs.
 */
export class LocalFileConverter implements DocumentConverter {
  public readonly name = 'local';

  async convert(source: DocumentSource): Promise<string[]> {
    const content = await readFile(source.filePath, 'utf-8');
    const extension = extname(source.fileName).toLowerCase();

    return TEXT_EXTENSIONS.some((ext) => ext === extension)
      ? textToParagraphs(content)
      : htmlToParagraphs(content);
  }
}

export default LocalFileConverter;
