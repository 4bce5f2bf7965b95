/**
 * Processed-File Registry
 *
 * Remembers which file ids already produced results so re-uploads of the
 * same document are skipped. Kept in a Redis set when Redis is available,
 * and always in a process-local set.
 *
 * KEY: extraction:processed-files
 */

import { safeRedisOperation, safeRedisWrite } from './client';

const PROCESSED_FILES_KEY = 'extraction:processed-files';

const localRegistry = new Set<string>();

export async function isFileProcessed(fileId: string): Promise<boolean> {
  if (localRegistry.has(fileId)) {
    return true;
  }

  return safeRedisOperation(
    async (client) => (await client.sismember(PROCESSED_FILES_KEY, fileId)) === 1,
    false,
    `Processed file CHECK (${fileId})`
  );
}

export async function markFileProcessed(fileId: string): Promise<void> {
  localRegistry.add(fileId);

  await safeRedisWrite(async (client) => {
    await client.sadd(PROCESSED_FILES_KEY, fileId);
  }, `Processed file MARK (${fileId})`);
}

/**
 * Forgets every processed file id held by this process
 */
export function resetLocalProcessedFiles(): void {
  localRegistry.clear();
}
