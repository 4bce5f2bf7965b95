/**
 * Redis Module
 *
 * Redis is optional. Every helper here degrades to a no-op or a fallback
 * value when Redis is disabled or unreachable.
 */

// Client exports
export {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

// Batch progress exports
export {
  getCachedBatchProgress,
  setCachedBatchProgress,
  incrementBatchProgress,
  updateBatchStatus,
  batchProgressKey,
  type BatchProgress,
  type BatchStatusName,
} from './batchProgress';

// Processed-file registry exports
export { isFileProcessed, markFileProcessed, resetLocalProcessedFiles } from './processedFiles';
