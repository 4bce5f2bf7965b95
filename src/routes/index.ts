import { Router } from 'express';
import healthRoutes from './health.routes';
import extractionRoutes from './extraction.routes';
import batchesRoutes from './batches.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Synchronous extraction (text, similarity, single document)
router.use('/extraction', extractionRoutes);

// Background batch extraction
router.use('/batches', batchesRoutes);

export default router;
