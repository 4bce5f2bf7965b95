/**
 * Batch API Routes
 *
 * Endpoints:
 * - POST / - Upload documents for background extraction
 * - GET /:batchId - Batch progress and per-document outcomes
 */

import { Router } from 'express';
import { batchController } from '../controllers';
import { documentUpload, MAX_BATCH_FILES } from '../middlewares';

const router = Router();

/**
 * @route   POST /batches
 * @desc    Queue documents for extraction
 * @access  Public
 *
 * Response:
 * - 202 Accepted: { batchId, status, total, statusUrl }
 */
router.post('/', documentUpload.array('documents', MAX_BATCH_FILES), batchController.submitBatch);

/**
 * @route   GET /batches/:batchId
 * @desc    Batch status
 * @access  Public
 */
router.get('/:batchId', batchController.getBatchStatus);

export default router;
