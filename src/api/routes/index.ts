/**
 * API routes index
 */

import { Router } from 'express';
import healthRoutes from './health.routes.js';
import patternsRoutes from './patterns.routes.js';

const router = Router();

// Mount routes
router.use('/health', healthRoutes);
router.use('/patterns', patternsRoutes);

export default router;
