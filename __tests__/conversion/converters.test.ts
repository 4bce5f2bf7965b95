/**
 * Tests for document converters
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  LocalFileConverter,
  selectConverter,
  TikaDocumentConverter,
  type ConverterSet,
  type DocumentConverter,
} from '../../src/conversion';
import { SAMPLE_HTML, SAMPLE_TEXT } from '../fixtures/invoices';

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

const fakeFetch = (calls: RecordedCall[], respond: () => Promise<Response>): typeof fetch => {
  return async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    calls.push({ url: String(input), init });
    return respond();
  };
};

describe('Converters', () => {
  let workDir: string;

  beforeAll(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'converters-'));
  });

  afterAll(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  // ============================================
  // Remote conversion
  // ============================================
  describe('TikaDocumentConverter', () => {
    const source = () => ({ filePath: join(workDir, 'invoice.pdf'), fileName: 'invoice.pdf' });

    beforeAll(async () => {
      await writeFile(join(workDir, 'invoice.pdf'), Buffer.from('%PDF-1.4 test'));
    });

    it('should PUT the document and split the returned XHTML into paragraphs', async () => {
      const calls: RecordedCall[] = [];
      const converter = new TikaDocumentConverter({
        baseUrl: 'http://tika.test:9998/',
        timeoutMs: 1000,
        fetchImpl: fakeFetch(calls, async () => new Response(SAMPLE_HTML, { status: 200 })),
      });

      const paragraphs = await converter.convert(source());

      expect(paragraphs).toHaveLength(4);
      expect(paragraphs[0]).toBe('Invoice');
      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe('http://tika.test:9998/tika');
      expect(calls[0].init?.method).toBe('PUT');
      expect(calls[0].init?.headers).toEqual({
        Accept: 'text/html',
        'Content-Type': 'application/octet-stream',
      });
    });

    it('should reject when the service answers with an error status', async () => {
      const converter = new TikaDocumentConverter({
        fetchImpl: fakeFetch([], async () => new Response('boom', { status: 500, statusText: 'Server Error' })),
      });

      await expect(converter.convert(source())).rejects.toThrow('Tika responded with 500 Server Error');
    });

    it('should reject when the service is unreachable', async () => {
      const converter = new TikaDocumentConverter({
        fetchImpl: fakeFetch([], async () => {
          throw new Error('connect ECONNREFUSED');
        }),
      });

      await expect(converter.convert(source())).rejects.toThrow('connect ECONNREFUSED');
    });
  });

  // ============================================
  // Local text and HTML
  // ============================================
  describe('LocalFileConverter', () => {
    const converter = new LocalFileConverter();

    it('should split plain text on blank lines', async () => {
      const filePath = join(workDir, 'invoice.txt');
      await writeFile(filePath, SAMPLE_TEXT, 'utf-8');

      const paragraphs = await converter.convert({ filePath, fileName: 'invoice.txt' });

      expect(paragraphs).toHaveLength(5);
      expect(paragraphs[4]).toBe('Page 1 of 1');
    });

    it('should read HTML paragraphs', async () => {
      const filePath = join(workDir, 'invoice.html');
      await writeFile(filePath, SAMPLE_HTML, 'utf-8');

      const paragraphs = await converter.convert({ filePath, fileName: 'invoice.HTML' });

      expect(paragraphs).toHaveLength(4);
      expect(paragraphs[1]).toBe('Invoice # 1234567890\nBilling Cycle Date: JAN 15 2024\nCurrency: USD');
    });
  });

  // ============================================
  // Selection
  // ============================================
  describe('selectConverter', () => {
    const binary: DocumentConverter = { name: 'binary', convert: async () => [] };
    const local: DocumentConverter = { name: 'local', convert: async () => [] };
    const converters: ConverterSet = { binary, local };

    it('should send PDFs to the binary converter', () => {
      expect(selectConverter('Invoice_01.PDF', converters)).toBe(binary);
    });

    it('should read text formats locally', () => {
      expect(selectConverter('a.html', converters)).toBe(local);
      expect(selectConverter('a.xhtml', converters)).toBe(local);
      expect(selectConverter('a.txt', converters)).toBe(local);
    });

    it('should return null for unsupported types', () => {
      expect(selectConverter('a.docx', converters)).toBeNull();
      expect(selectConverter('README', converters)).toBeNull();
    });
  });
});
