/**
 * Workers Module
 *
 * Queue definition and job processor for batch extraction.
 */

export {
  EXTRACTION_QUEUE_NAME,
  getExtractionQueue,
  enqueueExtractionBatch,
  closeExtractionQueue,
  setupExtractionWorker,
  type ExtractionJobData,
  type ExtractionJobFile,
} from './extraction.queue';

export { processExtractionJob, type ExtractionJob } from './extractionWorker';
