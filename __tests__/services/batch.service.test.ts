/**
 * Tests for the Batch Service
 *
 * Redis is disabled in tests, so state comes from the in-process registry
 * and batches dispatched without a stand-in run in-process.
 */

import { existsSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LocalFileConverter } from '../../src/conversion';
import { resetLocalProcessedFiles } from '../../src/redis';
import { BatchService, type BatchStatusView } from '../../src/services/batch.service';
import {
  ExtractionService,
  type ProcessDocumentParams,
  type ProcessedDocument,
} from '../../src/services/extraction.service';
import { ResultWriter } from '../../src/storage/resultWriter';
import type { ExtractionJobData, ExtractionJobFile } from '../../src/workers/extraction.queue';
import { SAMPLE_TEXT } from '../fixtures/invoices';

class ExplodingExtractionService extends ExtractionService {
  async processDocument(_params: ProcessDocumentParams): Promise<ProcessedDocument> {
    throw new Error('disk full');
  }
}

describe('BatchService', () => {
  let workDir: string;
  let extraction: ExtractionService;

  const upload = async (fileName: string, content: string, fileId = fileName): Promise<ExtractionJobFile> => {
    const filePath = join(workDir, `upload-${Math.random().toString(36).slice(2)}-${fileName}`);
    await writeFile(filePath, content, 'utf-8');
    return { fileName, filePath, fileId };
  };

  const waitForStatus = async (service: BatchService, batchId: string, status: string): Promise<BatchStatusView> => {
    for (let attempt = 0; attempt < 200; attempt++) {
      const view = await service.getBatchStatus(batchId);
      if (view?.status === status) {
        return view;
      }
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    throw new Error(`Batch ${batchId} never reached ${status}`);
  };

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'batch-service-'));
    extraction = new ExtractionService({
      converters: { binary: new LocalFileConverter(), local: new LocalFileConverter() },
      writer: new ResultWriter(join(workDir, 'out')),
    });
    resetLocalProcessedFiles();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  // ============================================
  // Processing
  // ============================================
  describe('processBatch', () => {
    it('should record one outcome per document and keep going after failures', async () => {
      const service = new BatchService({ extraction, filenamePattern: null });
      const files = [
        await upload('good.txt', SAMPLE_TEXT),
        await upload('letter.txt', 'Invoice\n\nThank you for your business'),
        await upload('notes.docx', 'hello'),
      ];

      const batch = await service.processBatch({ batchId: 'batch-1', files });

      expect(batch.status).toBe('completed');
      expect(batch.outcomes.map((outcome) => [outcome.fileName, outcome.status, outcome.code])).toEqual([
        ['good.txt', 'succeeded', undefined],
        ['letter.txt', 'failed', 'PARSER_EMPTY_RESULT'],
        ['notes.docx', 'failed', 'INPUT_MISSING'],
      ]);
      expect(batch.outcomes[0]).toMatchObject({
        rows: 2,
        outputKey: 'invoices/year=2024/month=01/good.json',
      });
      expect(batch.progress).toEqual({
        total: 3,
        processed: 3,
        succeeded: 1,
        failed: 2,
        skipped: 0,
        rows: 2,
        status: 'completed',
      });
    });

    it('should remove uploaded files once processed', async () => {
      const service = new BatchService({ extraction, filenamePattern: null });
      const files = [await upload('good.txt', SAMPLE_TEXT), await upload('notes.docx', 'hello')];

      await service.processBatch({ batchId: 'batch-2', files });

      expect(files.map((file) => existsSync(file.filePath))).toEqual([false, false]);
    });

    it('should skip documents that were already processed', async () => {
      const service = new BatchService({ extraction, filenamePattern: null });

      await service.processBatch({ batchId: 'first', files: [await upload('good.txt', SAMPLE_TEXT, 'same-id')] });
      const second = await service.processBatch({
        batchId: 'second',
        files: [await upload('good.txt', SAMPLE_TEXT, 'same-id')],
      });

      expect(second.outcomes).toEqual([
        { fileName: 'good.txt', fileId: 'same-id', status: 'skipped', reason: 'Already processed' },
      ]);
      expect(second.progress.skipped).toBe(1);
    });

    it('should skip files whose name does not match the invoice pattern', async () => {
      const service = new BatchService({ extraction, filenamePattern: /^invoice_/i });
      const files = [await upload('Invoice_01.txt', SAMPLE_TEXT), await upload('notes.txt', SAMPLE_TEXT)];

      const batch = await service.processBatch({ batchId: 'pattern', files });

      expect(batch.outcomes.map((outcome) => outcome.status)).toEqual(['succeeded', 'skipped']);
      expect(batch.outcomes[1].reason).toBe('File name does not match the invoice pattern');
    });

    it('should report progress after each document', async () => {
      const service = new BatchService({ extraction, filenamePattern: null });
      const files = [await upload('a.txt', SAMPLE_TEXT), await upload('b.txt', SAMPLE_TEXT)];
      const reported: number[] = [];

      await service.processBatch({ batchId: 'progress', files }, async (percent) => {
        reported.push(percent);
      });

      expect(reported).toEqual([50, 100]);
    });

    it('should record unexpected errors without failing the batch', async () => {
      const service = new BatchService({ extraction: new ExplodingExtractionService(), filenamePattern: null });

      const batch = await service.processBatch({
        batchId: 'unexpected',
        files: [await upload('good.txt', SAMPLE_TEXT)],
      });

      expect(batch.status).toBe('completed');
      expect(batch.outcomes[0]).toMatchObject({ status: 'failed', code: 'UNEXPECTED_ERROR', reason: 'disk full' });
    });

    it('should mark the batch failed and rethrow when progress reporting breaks', async () => {
      const service = new BatchService({ extraction, filenamePattern: null });
      const files = [await upload('good.txt', SAMPLE_TEXT)];

      await expect(
        service.processBatch({ batchId: 'broken', files }, async () => {
          throw new Error('lock lost');
        })
      ).rejects.toThrow('lock lost');

      const view = await service.getBatchStatus('broken');
      expect(view?.status).toBe('failed');
    });
  });

  // ============================================
  // Submission and status
  // ============================================
  describe('submitBatch', () => {
    it('should register the batch as queued and dispatch it', async () => {
      const dispatched: ExtractionJobData[] = [];
      const service = new BatchService({
        extraction,
        filenamePattern: null,
        dispatch: async (data) => {
          dispatched.push(data);
        },
      });
      const files = [await upload('good.txt', SAMPLE_TEXT)];

      const batch = await service.submitBatch(files);
      const view = await service.getBatchStatus(batch.id);

      expect(dispatched).toEqual([{ batchId: batch.id, files }]);
      expect(view).toMatchObject({
        id: batch.id,
        status: 'queued',
        percentComplete: 0,
        outcomes: [],
        startedAt: null,
        completedAt: null,
      });
    });

    it('should process in-process when Redis is unavailable', async () => {
      const service = new BatchService({ extraction, filenamePattern: null });

      const batch = await service.submitBatch([await upload('good.txt', SAMPLE_TEXT)]);
      const view = await waitForStatus(service, batch.id, 'completed');

      expect(view.percentComplete).toBe(100);
      expect(view.progress.succeeded).toBe(1);
    });
  });

  describe('getBatchStatus', () => {
    it('should return null for an unknown batch', async () => {
      const service = new BatchService({ extraction, filenamePattern: null });
      expect(await service.getBatchStatus('00000000-0000-4000-8000-000000000000')).toBeNull();
    });
  });
});
