/**
 * Patterns controller - tactical pattern detection and move ordering
 */

import type { Request, Response } from 'express';
import { BoardFactStore } from '../../board/BoardFactStore.js';
import { parseUciMove } from '../../board/chessJsAdapter.js';
import { formatMove, formatSquare, parseSquare } from '../../board/squares.js';
import {
  tacticalPatternService,
  type TacticalPatternService,
} from '../../services/TacticalPatternService.js';
import type {
  CandidateMove,
  OrderMovesResponse,
  Piece,
  ScoredMove,
  ScoredMoveResponse,
  ScoringPolicy,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import {
  boardRequestSchema,
  positionRequestSchema,
  validateRequest,
} from '../../utils/validation.js';
import { createApiError } from '../middleware/errorHandler.js';

const patternsLogger = logger.child({ controller: 'patterns' });

function toResponse(scored: ScoredMove): ScoredMoveResponse {
  return {
    uci: formatMove(scored.move),
    score: scored.score,
    givesCheck: scored.analysis.givesCheck,
    createsPromotion: scored.analysis.createsPromotion,
    kindScores: scored.kindScores,
    matches: scored.analysis.matches.map((m) => ({
      kind: m.kind,
      score: m.score,
      squares: m.squares.map(formatSquare),
    })),
  };
}

function policySummary(policy: ScoringPolicy): OrderMovesResponse['policy'] {
  return { selection: policy.selection, aggregation: policy.aggregation };
}

export class PatternsController {
  constructor(private readonly service: TacticalPatternService = tacticalPatternService) {}

  /**
   * POST /api/v1/patterns/position
   * Order the legal moves of a FEN position
   */
  analyzePosition(req: Request, res: Response): void {
    const validation = validateRequest(positionRequestSchema, req.body);

    if (!validation.success) {
      throw validation.errors;
    }

    const { fen, moves, policy } = validation.data;
    const result = this.service.analyzePosition(fen, { moves, policy });

    patternsLogger.info(
      { fen: result.fen, candidates: result.moves.length },
      'Position ordered'
    );

    const response: OrderMovesResponse = {
      fen: result.fen,
      policy: policySummary(result.policy),
      moves: result.moves.map(toResponse),
    };
    res.json(response);
  }

  /**
   * POST /api/v1/patterns/board
   * Order moves on a raw piece list (no legality checks)
   */
  analyzeBoard(req: Request, res: Response): void {
    const validation = validateRequest(boardRequestSchema, req.body);

    if (!validation.success) {
      throw validation.errors;
    }

    const { pieces, moves, policy } = validation.data;

    const placed: Piece[] = pieces.map((p) => {
      const sq = parseSquare(p.square);
      if (!sq) {
        throw createApiError(`Invalid square ${p.square}`, 400, 'VALIDATION_ERROR');
      }
      return { type: p.type, color: p.color, square: sq };
    });
    const board = BoardFactStore.fromPieces(placed);

    const candidates: CandidateMove[] = moves.map(({ uci, givesCheck }) => {
      const move = parseUciMove(uci);
      if (!move) {
        throw createApiError(`Invalid move ${uci}`, 400, 'VALIDATION_ERROR');
      }
      return { ...move, givesCheck };
    });

    const scorer = this.service.createScorer(policy);
    const ordered = this.service.orderMoves(board, candidates, policy);

    patternsLogger.info({ pieces: placed.length, candidates: candidates.length }, 'Board ordered');

    const response: OrderMovesResponse = {
      policy: policySummary(scorer.policy),
      moves: ordered.map(toResponse),
    };
    res.json(response);
  }
}

export const patternsController = new PatternsController();
