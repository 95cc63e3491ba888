/**
 * Tactical Pattern Service - runs every detector over the candidate moves of
 * one search node and orders them for alpha-beta search.
 *
 * One BoardGeometry is created per node so path queries are shared across
 * moves and detectors.
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { parsePosition } from '../board/chessJsAdapter.js';
import { assertWellFormedMove } from '../board/contracts.js';
import { config } from '../config/index.js';
import {
  AbsolutePinDetector,
  CaptureDetector,
  ForkDetector,
  PromotionDetector,
  RelativePinDetector,
  SkewerDetector,
  type PatternDetector,
} from '../detectors/index.js';
import { BoardGeometry } from '../geometry/BoardGeometry.js';
import { MoveOrderer, MoveScorer } from '../scoring/index.js';
import type {
  CandidateMove,
  MoveAnalysis,
  PatternMatch,
  ScoredMove,
  ScoringPolicy,
  ScoringPolicyOverrides,
} from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const patternLogger = createChildLogger('patterns');

export interface TacticalPatternServiceOptions {
  policy?: ScoringPolicyOverrides;
  memoizeGeometry?: boolean;
  assertContracts?: boolean;
}

export interface PositionOrdering {
  readonly fen: string;
  readonly policy: ScoringPolicy;
  readonly moves: ScoredMove[];
}

export class TacticalPatternService {
  private readonly scoredDetectors: readonly PatternDetector[] = [
    new AbsolutePinDetector(),
    new RelativePinDetector(),
    new ForkDetector(),
    new SkewerDetector(),
    new CaptureDetector(),
  ];
  private readonly promotionDetector = new PromotionDetector();

  private readonly defaultPolicy: ScoringPolicyOverrides;
  private readonly memoizeGeometry: boolean;
  private readonly assertContracts: boolean;

  constructor(options: TacticalPatternServiceOptions = {}) {
    this.defaultPolicy = options.policy ?? {
      selection: config.scoringSelection,
      aggregation: config.scoringAggregation,
    };
    this.memoizeGeometry = options.memoizeGeometry ?? config.geometryCache;
    this.assertContracts = options.assertContracts ?? config.assertContracts;
  }

  /**
   * Geometry for one node; pass it to every analyzeMove call at that node
   */
  createGeometry(board: BoardFactStore): BoardGeometry {
    return new BoardGeometry(board, { memoize: this.memoizeGeometry });
  }

  /**
   * Every match of every detector for one move
   */
  analyzeMove(
    board: BoardFactStore,
    move: CandidateMove,
    geometry: BoardGeometry = this.createGeometry(board)
  ): MoveAnalysis {
    if (this.assertContracts) {
      assertWellFormedMove(board, move);
    }

    const matches: PatternMatch[] = this.scoredDetectors.flatMap((detector) =>
      detector.detect(board, move, geometry)
    );
    const promotion = this.promotionDetector.detect(board, move);

    return {
      move,
      matches: [...matches, ...promotion],
      createsPromotion: promotion.length > 0,
      givesCheck: move.givesCheck ?? false,
    };
  }

  analyzeMoves(board: BoardFactStore, candidates: readonly CandidateMove[]): MoveAnalysis[] {
    const geometry = this.createGeometry(board);
    const analyses = candidates.map((move) => this.analyzeMove(board, move, geometry));

    patternLogger.debug(
      {
        pieces: board.pieces().length,
        candidates: candidates.length,
        matched: analyses.filter((a) => a.matches.length > 0).length,
        pathCache: geometry.cacheStats(),
      },
      'Analyzed node'
    );

    return analyses;
  }

  /**
   * Score and sort candidates, best first
   */
  orderMoves(
    board: BoardFactStore,
    candidates: readonly CandidateMove[],
    policy: ScoringPolicyOverrides = {}
  ): ScoredMove[] {
    return this.createOrderer(policy).order(this.analyzeMoves(board, candidates));
  }

  /**
   * Ordering score of a single move
   */
  scoreMove(board: BoardFactStore, move: CandidateMove, policy: ScoringPolicyOverrides = {}): number {
    return this.createOrderer(policy).score(this.analyzeMove(board, move)).score;
  }

  /**
   * Legal moves of a FEN position (or the listed UCI subset), analysed and ordered
   */
  analyzePosition(
    fen: string,
    options: { moves?: readonly string[]; policy?: ScoringPolicyOverrides } = {}
  ): PositionOrdering {
    const position = parsePosition(fen, options.moves);
    const scorer = this.createScorer(options.policy ?? {});
    const moves = new MoveOrderer(scorer).order(this.analyzeMoves(position.board, position.candidates));

    patternLogger.debug(
      { fen: position.fen, sideToMove: position.sideToMove, best: moves[0]?.score },
      'Ordered position'
    );

    return { fen: position.fen, policy: scorer.policy, moves };
  }

  createScorer(policy: ScoringPolicyOverrides = {}): MoveScorer {
    return new MoveScorer({
      selection: policy.selection ?? this.defaultPolicy.selection,
      aggregation: policy.aggregation ?? this.defaultPolicy.aggregation,
      weights: { ...this.defaultPolicy.weights, ...policy.weights },
    });
  }

  private createOrderer(policy: ScoringPolicyOverrides): MoveOrderer {
    return new MoveOrderer(this.createScorer(policy));
  }
}

export const tacticalPatternService = new TacticalPatternService();
