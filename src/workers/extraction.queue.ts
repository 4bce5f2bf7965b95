import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Job payload
// ============================================

export interface ExtractionJobFile {
  fileName: string;
  filePath: string;
  fileId: string;
}

export interface ExtractionJobData {
  batchId: string;
  files: ExtractionJobFile[];
}

// ============================================
// Redis Connection for BullMQ
// ============================================

const connection: ConnectionOptions = {
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
  // BullMQ requires maxRetriesPerRequest to be null
  maxRetriesPerRequest: null,
};

// ============================================
// Queue Definition
// ============================================

export const EXTRACTION_QUEUE_NAME = 'invoice-extraction';

let extractionQueue: Queue<ExtractionJobData> | null = null;

/**
 * Lazily creates the queue so importing this module opens no connection.
 */
export function getExtractionQueue(): Queue<ExtractionJobData> {
  if (!extractionQueue) {
    extractionQueue = new Queue<ExtractionJobData>(EXTRACTION_QUEUE_NAME, {
      connection,
      defaultJobOptions: {
        // Document failures are recorded per file; a job only fails on
        // unexpected errors, and its upload files are gone by then.
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: false,
      },
    });
  }
  return extractionQueue;
}

export async function enqueueExtractionBatch(data: ExtractionJobData): Promise<string | undefined> {
  const job = await getExtractionQueue().add('extract-batch', data, { jobId: data.batchId });
  return job.id;
}

export async function closeExtractionQueue(): Promise<void> {
  if (extractionQueue) {
    await extractionQueue.close();
    extractionQueue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupExtractionWorker(
  processor: (job: Job<ExtractionJobData>) => Promise<void>
): Worker<ExtractionJobData> {
  const worker = new Worker<ExtractionJobData>(EXTRACTION_QUEUE_NAME, processor, {
    connection,
    concurrency: 2,
    // Conversion of large PDFs can take a while
    lockDuration: 5 * 60 * 1000,
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id}] Extraction batch completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id}] Extraction batch failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
