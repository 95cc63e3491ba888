/**
 * Health check routes
 */

import { Router, Request, Response } from 'express';
import { config } from '../../config/index.js';
import { HealthResponse } from '../../types/index.js';
import { APP_VERSION } from '../../version.js';

const router = Router();
const startTime = Date.now();

router.get('/', (_req: Request, res: Response) => {
  const response: HealthResponse = {
    status: 'healthy',
    uptime: Math.floor((Date.now() - startTime) / 1000),
    version: APP_VERSION,
  };

  res.status(200).json(response);
});

// Detailed status for debugging
router.get('/detailed', (_req: Request, res: Response) => {
  res.json({
    uptime: Math.floor((Date.now() - startTime) / 1000),
    memory: process.memoryUsage(),
    engine: {
      scoringSelection: config.scoringSelection,
      scoringAggregation: config.scoringAggregation,
      geometryCache: config.geometryCache,
      assertContracts: config.assertContracts,
      maxMovesPerRequest: config.maxMovesPerRequest,
    },
    env: {
      nodeEnv: config.nodeEnv,
    },
  });
});

export default router;
