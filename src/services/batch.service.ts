/**
 * Batch Service
 *
 * Tracks multi-document extraction batches. Each document is processed on
 * its own: a failure is recorded under its extraction error code and the
 * batch carries on with the next file.
 *
 * State lives in an in-process registry and is mirrored to Redis
 * (`batch:{id}:progress`) so another process can report progress.
 */

import { randomUUID } from 'crypto';
import { unlink } from 'fs/promises';
import { env } from '../config';
import { isExtractionError } from '../extraction';
import {
  getCachedBatchProgress,
  incrementBatchProgress,
  isFileProcessed,
  isRedisAvailable,
  setCachedBatchProgress,
  updateBatchStatus,
  type BatchProgress,
  type BatchStatusName,
} from '../redis';
import { logger } from '../utils';
import {
  enqueueExtractionBatch,
  type ExtractionJobData,
  type ExtractionJobFile,
} from '../workers/extraction.queue';
import { extractionService, type ExtractionService } from './extraction.service';

// ============================================
// Types
// ============================================

export type DocumentOutcomeStatus = 'succeeded' | 'failed' | 'skipped';

export interface DocumentOutcome {
  fileName: string;
  fileId: string;
  status: DocumentOutcomeStatus;
  rows?: number;
  outputKey?: string;
  /** Extraction error code, or UNEXPECTED_ERROR */
  code?: string;
  reason?: string;
}

export interface ExtractionBatch {
  id: string;
  status: BatchStatusName;
  files: ExtractionJobFile[];
  progress: BatchProgress;
  outcomes: DocumentOutcome[];
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface BatchStatusView {
  id: string;
  status: BatchStatusName;
  progress: BatchProgress;
  percentComplete: number;
  outcomes: DocumentOutcome[] | null;
  createdAt: string | null;
  startedAt: string | null;
  completedAt: string | null;
}

export interface BatchServiceDeps {
  extraction?: ExtractionService;
  filenamePattern?: RegExp | null;
  dispatch?: (data: ExtractionJobData) => Promise<void>;
}

// ============================================
// Helpers
// ============================================

const percentOf = (progress: BatchProgress): number =>
  progress.total > 0 ? Math.round((progress.processed / progress.total) * 100) : 0;

const emptyProgress = (total: number): BatchProgress => ({
  total,
  processed: 0,
  succeeded: 0,
  failed: 0,
  skipped: 0,
  rows: 0,
  status: 'queued',
});

const configuredPattern = (): RegExp | null =>
  env.INVOICE_FILENAME_PATTERN ? new RegExp(env.INVOICE_FILENAME_PATTERN, 'i') : null;

async function removeUpload(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    logger.debug(`Upload already removed: ${filePath} (${error instanceof Error ? error.message : 'unknown'})`);
  }
}

// ============================================
// Service
// ============================================

export class BatchService {
  private readonly batches = new Map<string, ExtractionBatch>();
  private readonly extraction: ExtractionService;
  private readonly filenamePattern: RegExp | null;
  private readonly dispatch: (data: ExtractionJobData) => Promise<void>;

  constructor(deps: BatchServiceDeps = {}) {
    this.extraction = deps.extraction ?? extractionService;
    this.filenamePattern = deps.filenamePattern === undefined ? configuredPattern() : deps.filenamePattern;
    this.dispatch = deps.dispatch ?? ((data) => this.dispatchBatch(data));
  }

  /**
   * Registers a batch and hands it to the queue (or runs it in-process when
   * Redis is unavailable).
   */
  async submitBatch(files: ExtractionJobFile[]): Promise<ExtractionBatch> {
    const batch = this.registerBatch(randomUUID(), files);
    await setCachedBatchProgress(batch.id, batch.progress);
    await this.dispatch({ batchId: batch.id, files });
    return batch;
  }

  /**
   * Processes every file of a batch in order. Documents never fail the
   * batch; only an unexpected error does, after which it is rethrown.
   */
  async processBatch(data: ExtractionJobData, onProgress?: (percent: number) => Promise<void>): Promise<ExtractionBatch> {
    const batch = this.batches.get(data.batchId) ?? this.registerBatch(data.batchId, data.files);

    batch.status = 'processing';
    batch.progress.status = 'processing';
    batch.startedAt = new Date();
    await updateBatchStatus(batch.id, 'processing');

    logger.info(`[${batch.id}] Processing ${batch.files.length} documents`);

    try {
      for (const file of batch.files) {
        const outcome = await this.processFile(file);
        this.record(batch, outcome);

        await incrementBatchProgress(batch.id, {
          processed: 1,
          succeeded: outcome.status === 'succeeded' ? 1 : 0,
          failed: outcome.status === 'failed' ? 1 : 0,
          skipped: outcome.status === 'skipped' ? 1 : 0,
          rows: outcome.rows ?? 0,
        });

        if (onProgress) {
          await onProgress(percentOf(batch.progress));
        }
      }

      this.finish(batch, 'completed');
      await updateBatchStatus(batch.id, 'completed');

      const { succeeded, failed, skipped } = batch.progress;
      logger.info(`[${batch.id}] ✅ Batch complete: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`);
      return batch;
    } catch (error) {
      this.finish(batch, 'failed');
      await updateBatchStatus(batch.id, 'failed');
      logger.error(`[${batch.id}] ❌ Batch failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
      throw error;
    }
  }

  /**
   * Status of a batch from the local registry, or from the Redis mirror when
   * another process owns it.
   */
  async getBatchStatus(batchId: string): Promise<BatchStatusView | null> {
    const batch = this.batches.get(batchId);

    if (batch) {
      return {
        id: batch.id,
        status: batch.status,
        progress: { ...batch.progress },
        percentComplete: percentOf(batch.progress),
        outcomes: [...batch.outcomes],
        createdAt: batch.createdAt.toISOString(),
        startedAt: batch.startedAt?.toISOString() ?? null,
        completedAt: batch.completedAt?.toISOString() ?? null,
      };
    }

    const cached = await getCachedBatchProgress(batchId);
    if (!cached) {
      return null;
    }

    return {
      id: batchId,
      status: cached.status,
      progress: cached,
      percentComplete: percentOf(cached),
      outcomes: null,
      createdAt: null,
      startedAt: null,
      completedAt: null,
    };
  }

  // ============================================
  // Internals
  // ============================================

  private registerBatch(id: string, files: ExtractionJobFile[]): ExtractionBatch {
    const batch: ExtractionBatch = {
      id,
      status: 'queued',
      files,
      progress: emptyProgress(files.length),
      outcomes: [],
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
    };
    this.batches.set(id, batch);
    return batch;
  }

  private async dispatchBatch(data: ExtractionJobData): Promise<void> {
    if (isRedisAvailable()) {
      const jobId = await enqueueExtractionBatch(data);
      logger.info(`[${data.batchId}] Queued as job ${jobId ?? 'unknown'}`);
      return;
    }

    logger.info(`[${data.batchId}] Redis unavailable, processing in-process`);
    setImmediate(() => {
      this.processBatch(data).catch((error: unknown) => {
        logger.error(
          `[${data.batchId}] In-process batch aborted: ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      });
    });
  }

  private async processFile(file: ExtractionJobFile): Promise<DocumentOutcome> {
    const base = { fileName: file.fileName, fileId: file.fileId };

    try {
      if (this.filenamePattern && !this.filenamePattern.test(file.fileName)) {
        return { ...base, status: 'skipped', reason: 'File name does not match the invoice pattern' };
      }

      if (await isFileProcessed(file.fileId)) {
        return { ...base, status: 'skipped', reason: 'Already processed' };
      }

      const result = await this.extraction.processDocument(file);
      return { ...base, status: 'succeeded', rows: result.records.length, outputKey: result.outputKey };
    } catch (error) {
      if (isExtractionError(error)) {
        logger.warn(`${file.fileName}: ${error.code} - ${error.message}`);
        return { ...base, status: 'failed', code: error.code, reason: error.message };
      }

      const reason = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`${file.fileName}: unexpected failure - ${reason}`);
      return { ...base, status: 'failed', code: 'UNEXPECTED_ERROR', reason };
    } finally {
      await removeUpload(file.filePath);
    }
  }

  private record(batch: ExtractionBatch, outcome: DocumentOutcome): void {
    batch.outcomes.push(outcome);
    batch.progress.processed++;
    batch.progress[outcome.status]++;
    batch.progress.rows += outcome.rows ?? 0;
  }

  private finish(batch: ExtractionBatch, status: 'completed' | 'failed'): void {
    batch.status = status;
    batch.progress.status = status;
    batch.completedAt = new Date();
  }
}

export const batchService = new BatchService();

export default batchService;
