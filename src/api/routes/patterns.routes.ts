/**
 * Pattern detection routes
 */

import { Router } from 'express';
import { patternsController } from '../controllers/patterns.controller.js';

const router = Router();

/**
 * POST /api/v1/patterns/position
 *
 * Request body:
 * {
 *   fen: string,            // Position FEN
 *   moves?: string[],       // UCI subset of legal moves (default: all legal moves)
 *   policy?: { selection?, aggregation?, weights? }
 * }
 *
 * Response:
 * {
 *   fen: string,
 *   policy: { selection, aggregation },
 *   moves: ScoredMoveResponse[]   // best first
 * }
 */
router.post('/position', (req, res, next) => {
  try {
    patternsController.analyzePosition(req, res);
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/v1/patterns/board
 *
 * Request body:
 * {
 *   pieces: [{ type: 'p'|'n'|'b'|'r'|'q'|'k', color: 'white'|'black', square: 'e4' }],
 *   moves: [{ uci: 'e2e4', givesCheck?: boolean }],
 *   policy?: { selection?, aggregation?, weights? }
 * }
 */
router.post('/board', (req, res, next) => {
  try {
    patternsController.analyzeBoard(req, res);
  } catch (error) {
    next(error);
  }
});

export default router;
