/**
 * Result Writer
 *
 * Persists the enriched rows of one document as a JSON array under an
 * object-store style key, partitioned by billing cycle month:
 *
 *   invoices/year=2024/month=01/<document>.json
 *   invoices/unpartitioned/<document>.json   (no billing date)
 */

import { mkdir, writeFile } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { env } from '../config';
import type { EnrichedLineItemRecord } from '../extraction';
import { logger } from '../utils';

const KEY_PREFIX = 'invoices';

/**
 * Builds the storage key for a document's results.
 *
 * @example
 * buildResultKey('Invoice_0042.pdf', new Date('2024-01-15'))
 * // Returns: "invoices/year=2024/month=01/Invoice_0042.json"
 */
export function buildResultKey(fileName: string, billingCycleDate: Date | null): string {
  const stem = basename(fileName, extname(fileName));

  if (!billingCycleDate) {
    return `${KEY_PREFIX}/unpartitioned/${stem}.json`;
  }

  const year = billingCycleDate.getUTCFullYear();
  const month = String(billingCycleDate.getUTCMonth() + 1).padStart(2, '0');
  return `${KEY_PREFIX}/year=${year}/month=${month}/${stem}.json`;
}

export class ResultWriter {
  constructor(private readonly rootDir: string = env.OUTPUT_DIR) {}

  /**
   * Writes records under the key and returns the file path written.
   */
  async write(key: string, records: readonly EnrichedLineItemRecord[]): Promise<string> {
    const target = join(this.rootDir, ...key.split('/'));

    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(records, null, 2), 'utf-8');

    logger.info(`Stored ${records.length} rows at ${target}`);
    return target;
  }
}

export const resultWriter = new ResultWriter();

export default resultWriter;
