/**
 * Tests for the extraction job processor
 */

import { existsSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { resetLocalProcessedFiles } from '../../src/redis';
import { batchService } from '../../src/services/batch.service';
import { processExtractionJob, type ExtractionJob } from '../../src/workers/extractionWorker';
import { SAMPLE_TEXT } from '../fixtures/invoices';

describe('processExtractionJob', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'worker-'));
    resetLocalProcessedFiles();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should process the batch carried by the job and report progress', async () => {
    const filePath = join(workDir, 'upload-1.txt');
    await writeFile(filePath, SAMPLE_TEXT, 'utf-8');

    const reported: unknown[] = [];
    const job: ExtractionJob = {
      id: 'job-1',
      data: {
        batchId: 'worker-batch-1',
        files: [{ fileName: 'Invoice_W1.txt', filePath, fileId: 'worker-file-1' }],
      },
      updateProgress: async (progress) => {
        reported.push(progress);
      },
    };

    await processExtractionJob(job);

    const status = await batchService.getBatchStatus('worker-batch-1');
    expect(reported).toEqual([100]);
    expect(status?.status).toBe('completed');
    expect(status?.progress.succeeded).toBe(1);
    expect(existsSync(filePath)).toBe(false);
  });
});
