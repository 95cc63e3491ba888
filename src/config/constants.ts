/**
 * Engine constants - piece values and move-ordering weights
 */

import type { OrderingWeights, PieceType, ScoringPolicy } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════
// BOARD
// ═══════════════════════════════════════════════════════════════════════

export const BOARD_SIZE = 8;

/** Row a pawn promotes on, by color */
export const PROMOTION_ROW = {
  white: 8,
  black: 1,
} as const;

/** Row delta of a pawn capture, by color */
export const PAWN_DIRECTION = {
  white: 1,
  black: -1,
} as const;

// ═══════════════════════════════════════════════════════════════════════
// PIECE VALUES
// ═══════════════════════════════════════════════════════════════════════

/**
 * General piece values (pins, forks, skewers)
 */
export const PIECE_VALUES: Readonly<Record<PieceType, number>> = {
  p: 1,
  n: 3,
  b: 3,
  r: 5,
  q: 9,
  k: 100,
};

/**
 * MVV-LVA values - same as PIECE_VALUES except the king
 */
export const MVV_LVA_VALUES: Readonly<Record<PieceType, number>> = {
  ...PIECE_VALUES,
  k: 10,
};

/** Victim weight in the MVV-LVA formula */
export const MVV_LVA_VICTIM_MULTIPLIER = 10;

/** Pieces worth forking, and the only valid skewer front pieces */
export const HIGH_VALUE_TARGETS: readonly PieceType[] = ['k', 'q', 'r'];

// ═══════════════════════════════════════════════════════════════════════
// MOVE ORDERING
// ═══════════════════════════════════════════════════════════════════════

/**
 * Baselines and scaling for the weighted aggregation.
 * King-involved tactics > good captures > minor tactics ≈ medium captures
 */
export const ORDERING_WEIGHTS: Readonly<OrderingWeights> = {
  ABSOLUTE_PIN_BASE: 50,
  RELATIVE_PIN_BASE: 30,
  FORK_BASE: 100,
  SKEWER_BASE: 80,
  CAPTURE_BASE: 0,
  SCORE_MULTIPLIER: 3,
  PROMOTION_BONUS: 800,
  CHECK_BONUS: 50,
};

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  selection: 'best',
  aggregation: 'weighted',
  weights: { ...ORDERING_WEIGHTS },
};
