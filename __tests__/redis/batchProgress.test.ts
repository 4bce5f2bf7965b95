/**
 * Tests for Batch Progress Redis Module
 *
 * Redis is disabled in tests: reads fall back to null and writes are
 * skipped, so batch processing never depends on it.
 */

import {
  batchProgressKey,
  getCachedBatchProgress,
  incrementBatchProgress,
  setCachedBatchProgress,
  updateBatchStatus,
  type BatchProgress,
} from '../../src/redis/batchProgress';
import { isFileProcessed, markFileProcessed, resetLocalProcessedFiles } from '../../src/redis/processedFiles';

const PROGRESS: BatchProgress = {
  total: 3,
  processed: 1,
  succeeded: 1,
  failed: 0,
  skipped: 0,
  rows: 12,
  status: 'processing',
};

describe('Batch Progress', () => {
  describe('batchProgressKey', () => {
    it('should follow batch:{batchId}:progress pattern', () => {
      expect(batchProgressKey('123e4567-e89b-12d3-a456-426614174000')).toBe(
        'batch:123e4567-e89b-12d3-a456-426614174000:progress'
      );
    });
  });

  describe('without Redis', () => {
    it('should read nothing back', async () => {
      await setCachedBatchProgress('batch-1', PROGRESS);

      await expect(getCachedBatchProgress('batch-1')).resolves.toBeNull();
    });

    it('should accept increments and status updates', async () => {
      await expect(incrementBatchProgress('batch-1', { processed: 1, rows: 4 })).resolves.toBeUndefined();
      await expect(updateBatchStatus('batch-1', 'completed')).resolves.toBeUndefined();
    });
  });
});

describe('Processed Files', () => {
  beforeEach(() => {
    resetLocalProcessedFiles();
  });

  it('should remember processed file ids in process', async () => {
    expect(await isFileProcessed('file-a')).toBe(false);

    await markFileProcessed('file-a');

    expect(await isFileProcessed('file-a')).toBe(true);
    expect(await isFileProcessed('file-b')).toBe(false);
  });

  it('should forget everything on reset', async () => {
    await markFileProcessed('file-a');
    resetLocalProcessedFiles();

    expect(await isFileProcessed('file-a')).toBe(false);
  });
});
