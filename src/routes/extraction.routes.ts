/**
 * Extraction API Routes
 *
 * Endpoints:
 * - POST /text - Extract from text or paragraphs sent as JSON
 * - POST /similarity - Best fuzzy match among candidate names
 * - POST /documents - Upload one document and extract it synchronously
 */

import { Router } from 'express';
import { extractionController } from '../controllers';
import { documentUpload } from '../middlewares';

const router = Router();

/**
 * @route   POST /extraction/text
 * @desc    Extract metadata and detail rows from already-converted text
 * @access  Public
 *
 * Body: { text: string } | { paragraphs: string[] }, optional documentName
 */
router.post('/text', extractionController.extractText);

/**
 * @route   POST /extraction/similarity
 * @desc    Best match for a query among candidates
 * @access  Public
 *
 * Body: { query: string, candidates: string[] }
 */
router.post('/similarity', extractionController.findSimilar);

/**
 * @route   POST /extraction/documents
 * @desc    Convert, extract and store one document
 * @access  Public
 *
 * Multipart field: file (.pdf, .html, .htm, .xhtml, .txt)
 */
router.post('/documents', documentUpload.single('file'), extractionController.processDocument);

export default router;
