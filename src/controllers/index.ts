export { healthController, HealthController } from './health.controller';
export { extractionController, ExtractionController } from './extraction.controller';
export { batchController, BatchController } from './batch.controller';
