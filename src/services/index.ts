export { healthService, HealthService, checkOutputDirectory } from './health.service';
export * from './extraction.service';
export { batchService } from './batch.service';
export * from './batch.service';
