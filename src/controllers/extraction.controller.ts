import { Request, Response } from 'express';
import { unlink } from 'fs/promises';
import { z } from 'zod';
import {
  bestMatch,
  extractInvoice,
  hasVisibleText,
  normalizeText,
  toLineItemRecord,
  toMetadataRecord,
} from '../extraction';
import { extractionService } from '../services';
import { AppError, asyncHandler, logger, sendSuccess } from '../utils';

// ============================================
// Request Schemas
// ============================================

export const extractTextSchema = z
  .object({
    text: z
      .string()
      .refine((value) => normalizeText(value) !== '', { message: 'Must contain visible text' })
      .optional(),
    paragraphs: z
      .array(z.string())
      .refine(hasVisibleText, { message: 'At least one paragraph must contain visible text' })
      .optional(),
    documentName: z.string().min(1).max(255).optional(),
  })
  .refine((body) => (body.text === undefined) !== (body.paragraphs === undefined), {
    message: 'Provide exactly one of "text" or "paragraphs"',
  });

export const similaritySchema = z.object({
  query: z.string(),
  candidates: z.array(z.string()).max(10_000),
});

/**
 * Extraction controller
 */
export class ExtractionController {
  /**
   * POST /extraction/text
   * Extracts metadata and detail rows from plain text or paragraphs
   */
  extractText = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = extractTextSchema.parse(req.body);
    const input = body.paragraphs ?? body.text ?? '';

    const { metadata, missingFields, rows, stats } = extractInvoice(input, {
      documentName: body.documentName,
    });

    const degraded = rows.flatMap((row, index) =>
      row.degradedFields.length > 0 ? [{ row: index, fields: row.degradedFields }] : []
    );

    sendSuccess(
      res,
      {
        metadata: toMetadataRecord(metadata),
        missingFields,
        rows: rows.map(toLineItemRecord),
        degraded,
        stats,
      },
      `Extracted ${rows.length} rows`
    );
  });

  /**
   * POST /extraction/similarity
   * Best fuzzy match of a query among candidates
   */
  findSimilar = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { query, candidates } = similaritySchema.parse(req.body);
    sendSuccess(res, bestMatch(query, candidates));
  });

  /**
   * POST /extraction/documents
   * Runs one uploaded document through the full pipeline
   */
  processDocument = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const file = req.file;
    if (!file) {
      throw AppError.badRequest('No document uploaded. Send it in the "file" field.');
    }

    try {
      const { outputPath: _outputPath, ...result } = await extractionService.processDocument({
        filePath: file.path,
        fileName: file.originalname,
      });
      sendSuccess(res, result, `Extracted ${result.records.length} rows from ${file.originalname}`, 201);
    } finally {
      await unlink(file.path).catch((error: unknown) => {
        logger.debug(`Upload cleanup skipped for ${file.path}: ${error instanceof Error ? error.message : 'unknown'}`);
      });
    }
  });
}

export const extractionController = new ExtractionController();

export default extractionController;
