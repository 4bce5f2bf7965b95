/**
 * Batch Progress Module
 *
 * Mirrors extraction batch progress into Redis so any process (API or
 * worker) can read it. The in-process registry in the batch service is the
 * primary copy; Redis failures never affect processing.
 *
 * KEY FORMAT: batch:{batchId}:progress
 */

import { safeRedisOperation, safeRedisWrite } from './client';

const CACHE_KEY_PREFIX = 'batch:';
const CACHE_KEY_SUFFIX = ':progress';

/** Batches are expected to finish well within a day */
const CACHE_TTL_SECONDS = 24 * 60 * 60;

/**
 * Redis key for a batch's progress hash
 */
export function batchProgressKey(batchId: string): string {
  return `${CACHE_KEY_PREFIX}${batchId}${CACHE_KEY_SUFFIX}`;
}

export type BatchStatusName = 'queued' | 'processing' | 'completed' | 'failed';

/**
 * Batch progress counters stored in Redis
 */
export interface BatchProgress {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  rows: number;
  status: BatchStatusName;
}

const COUNTER_FIELDS = ['total', 'processed', 'succeeded', 'failed', 'skipped', 'rows'] as const;

type CounterField = (typeof COUNTER_FIELDS)[number];

const STATUS_NAMES: readonly BatchStatusName[] = ['queued', 'processing', 'completed', 'failed'];

function parseStatus(value: string | undefined): BatchStatusName {
  return STATUS_NAMES.find((status) => status === value) ?? 'queued';
}

/**
 * Gets cached batch progress, or null when absent or Redis is unavailable
 */
export async function getCachedBatchProgress(batchId: string): Promise<BatchProgress | null> {
  const cacheKey = batchProgressKey(batchId);

  return safeRedisOperation(
    async (client) => {
      const data = await client.hgetall(cacheKey);
      if (Object.keys(data).length === 0) {
        return null;
      }

      const counter = (field: CounterField): number => parseInt(data[field] ?? '0', 10) || 0;

      return {
        total: counter('total'),
        processed: counter('processed'),
        succeeded: counter('succeeded'),
        failed: counter('failed'),
        skipped: counter('skipped'),
        rows: counter('rows'),
        status: parseStatus(data.status),
      };
    },
    null,
    `Batch progress GET (${batchId})`
  );
}

/**
 * Stores the full progress snapshot and refreshes the TTL
 */
export async function setCachedBatchProgress(batchId: string, progress: BatchProgress): Promise<void> {
  const cacheKey = batchProgressKey(batchId);

  await safeRedisWrite(async (client) => {
    const fields: Record<string, string> = { status: progress.status };
    for (const field of COUNTER_FIELDS) {
      fields[field] = progress[field].toString();
    }

    await client.multi().hset(cacheKey, fields).expire(cacheKey, CACHE_TTL_SECONDS).exec();
  }, `Batch progress SET (${batchId})`);
}

/**
 * Increments counters atomically with HINCRBY
 */
export async function incrementBatchProgress(
  batchId: string,
  increments: Partial<Record<CounterField, number>>
): Promise<void> {
  const cacheKey = batchProgressKey(batchId);

  await safeRedisWrite(async (client) => {
    const multi = client.multi();
    for (const field of COUNTER_FIELDS) {
      const amount = increments[field];
      if (amount) {
        multi.hincrby(cacheKey, field, amount);
      }
    }
    multi.expire(cacheKey, CACHE_TTL_SECONDS);
    await multi.exec();
  }, `Batch progress INCREMENT (${batchId})`);
}

/**
 * Updates only the status field
 */
export async function updateBatchStatus(batchId: string, status: BatchStatusName): Promise<void> {
  const cacheKey = batchProgressKey(batchId);

  await safeRedisWrite(async (client) => {
    await client.hset(cacheKey, 'status', status);
  }, `Batch status UPDATE (${batchId})`);
}
