import { Request, Response } from 'express';
import { z } from 'zod';
import { batchService, computeFileId } from '../services';
import { AppError, asyncHandler, sendSuccess } from '../utils';
import type { ExtractionJobFile } from '../workers';

export const batchParamsSchema = z.object({
  batchId: z.string().uuid('Invalid batch ID format'),
});

const uploadedFiles = (req: Request): Express.Multer.File[] => {
  if (Array.isArray(req.files)) {
    return req.files;
  }
  return req.files ? Object.values(req.files).flat() : [];
};

/**
 * Batch controller
 */
export class BatchController {
  /**
   * POST /batches
   * Accepts documents for background extraction
   */
  submitBatch = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const uploads = uploadedFiles(req);
    if (uploads.length === 0) {
      throw AppError.badRequest('No documents uploaded. Send them in the "documents" field.');
    }

    const files: ExtractionJobFile[] = await Promise.all(
      uploads.map(async (upload) => ({
        fileName: upload.originalname,
        filePath: upload.path,
        fileId: await computeFileId(upload.path),
      }))
    );

    const batch = await batchService.submitBatch(files);

    sendSuccess(
      res,
      {
        batchId: batch.id,
        status: batch.status,
        total: batch.progress.total,
        statusUrl: `${req.baseUrl}/${batch.id}`,
      },
      `Batch accepted with ${files.length} documents`,
      202
    );
  });

  /**
   * GET /batches/:batchId
   * Progress and per-document outcomes
   */
  getBatchStatus = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { batchId } = batchParamsSchema.parse(req.params);

    const status = await batchService.getBatchStatus(batchId);
    if (!status) {
      throw AppError.notFound(`Batch not found: ${batchId}`);
    }

    sendSuccess(res, status);
  });
}

export const batchController = new BatchController();

export default batchController;
