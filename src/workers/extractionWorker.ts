/**
 * Extraction Worker
 *
 * BullMQ job processor for extraction batches. Each job carries a batch id
 * and the uploaded files; per-document failures are recorded by the batch
 * service and never fail the job.
 */

import { Job } from 'bullmq';
import { batchService } from '../services/batch.service';
import { logger } from '../utils';
import type { ExtractionJobData } from './extraction.queue';

export type ExtractionJob = Pick<Job<ExtractionJobData>, 'id' | 'data' | 'updateProgress'>;

export async function processExtractionJob(job: ExtractionJob): Promise<void> {
  const { batchId, files } = job.data;
  logger.info(`[Job ${job.id}] Starting batch ${batchId} (${files.length} documents)`);

  await batchService.processBatch(job.data, async (percent) => {
    await job.updateProgress(percent);
  });
}
