/**
 * Type definitions for tactical pattern detection
 */

/**
 * Piece symbols, same letters chess.js uses
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

export type Color = 'white' | 'black';

/**
 * Board coordinate, 1-indexed. Row 1 is white's back rank, col 1 is the a-file.
 */
export interface Square {
  readonly row: number;
  readonly col: number;
}

export interface Piece {
  readonly type: PieceType;
  readonly color: Color;
  readonly square: Square;
}

/**
 * Candidate move. The mover is still on `from` in the board snapshot.
 */
export interface Move {
  readonly from: Square;
  readonly to: Square;
  readonly promotion?: PieceType;
}

/**
 * Candidate move plus what the move generator knows about it
 */
export interface CandidateMove extends Move {
  readonly givesCheck?: boolean;
}

export type LineType = 'row' | 'column' | 'diagonal';

// ═══════════════════════════════════════════════════════════════════════
// Pattern matches
// ═══════════════════════════════════════════════════════════════════════

export enum PatternKind {
  ABSOLUTE_PIN = 'absolute_pin',
  RELATIVE_PIN = 'relative_pin',
  FORK = 'fork',
  SKEWER = 'skewer',
  CAPTURE = 'capture',
  PROMOTION = 'promotion',
}

/**
 * Kinds that carry a numeric score (promotion is a flag)
 */
export type ScoredPatternKind = Exclude<PatternKind, PatternKind.PROMOTION>;

/**
 * One solution of a detector for a (board, move) pair
 */
export interface PatternMatch {
  readonly kind: PatternKind;
  readonly score: number;
  /** Enemy squares involved: pinned/front piece first, then the piece behind or the second target */
  readonly squares: readonly Square[];
}

/**
 * Everything the detectors found for one move
 */
export interface MoveAnalysis {
  readonly move: CandidateMove;
  readonly matches: readonly PatternMatch[];
  readonly createsPromotion: boolean;
  readonly givesCheck: boolean;
}

export type KindScores = Partial<Record<ScoredPatternKind, number>>;

export interface ScoredMove {
  readonly move: CandidateMove;
  readonly analysis: MoveAnalysis;
  readonly kindScores: KindScores;
  readonly score: number;
}

// ═══════════════════════════════════════════════════════════════════════
// Scoring policy
// ═══════════════════════════════════════════════════════════════════════

/**
 * How several matches of the same kind combine for one move
 */
export type MatchSelection = 'best' | 'sum';

/**
 * How per-kind scores combine into the ordering score
 */
export type ScoreAggregation = 'weighted' | 'sum' | 'max';

export interface OrderingWeights {
  ABSOLUTE_PIN_BASE: number;
  RELATIVE_PIN_BASE: number;
  FORK_BASE: number;
  SKEWER_BASE: number;
  CAPTURE_BASE: number;
  SCORE_MULTIPLIER: number;
  PROMOTION_BONUS: number;
  CHECK_BONUS: number;
}

export interface ScoringPolicy {
  readonly selection: MatchSelection;
  readonly aggregation: ScoreAggregation;
  readonly weights: OrderingWeights;
}

export interface ScoringPolicyOverrides {
  selection?: MatchSelection;
  aggregation?: ScoreAggregation;
  weights?: Partial<OrderingWeights>;
}

// ═══════════════════════════════════════════════════════════════════════
// API Types
// ═══════════════════════════════════════════════════════════════════════

export interface PatternMatchResponse {
  kind: PatternKind;
  score: number;
  squares: string[];
}

export interface ScoredMoveResponse {
  uci: string;
  score: number;
  givesCheck: boolean;
  createsPromotion: boolean;
  kindScores: KindScores;
  matches: PatternMatchResponse[];
}

export interface OrderMovesResponse {
  fen?: string;
  policy: Omit<ScoringPolicy, 'weights'>;
  moves: ScoredMoveResponse[];
}

export interface HealthResponse {
  status: 'healthy';
  uptime: number;
  version: string;
}
