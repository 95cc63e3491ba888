/**
 * MoveScorer - folds detector output for one move into an ordering value
 *
 * Two independent choices, both supplied by the caller:
 * - selection: several matches of one kind -> one kind score ('best' | 'sum')
 * - aggregation: kind scores + promotion/check -> ordering score
 *
 * The result is a move-ordering heuristic only, never a position evaluation.
 */

import { DEFAULT_SCORING_POLICY } from '../config/constants.js';
import {
  PatternKind,
  type KindScores,
  type MoveAnalysis,
  type OrderingWeights,
  type PatternMatch,
  type ScoredPatternKind,
  type ScoringPolicy,
  type ScoringPolicyOverrides,
} from '../types/index.js';

export const SCORED_KINDS: readonly ScoredPatternKind[] = [
  PatternKind.ABSOLUTE_PIN,
  PatternKind.RELATIVE_PIN,
  PatternKind.FORK,
  PatternKind.SKEWER,
  PatternKind.CAPTURE,
];

function isScoredKind(kind: PatternKind): kind is ScoredPatternKind {
  return kind !== PatternKind.PROMOTION;
}

export class MoveScorer {
  readonly policy: ScoringPolicy;

  constructor(policy: ScoringPolicyOverrides = {}) {
    this.policy = {
      selection: policy.selection ?? DEFAULT_SCORING_POLICY.selection,
      aggregation: policy.aggregation ?? DEFAULT_SCORING_POLICY.aggregation,
      weights: { ...DEFAULT_SCORING_POLICY.weights, ...policy.weights },
    };
  }

  /**
   * One score per kind that matched at least once
   */
  kindScores(matches: readonly PatternMatch[]): KindScores {
    const scores: KindScores = {};

    for (const match of matches) {
      if (!isScoredKind(match.kind)) continue;

      const current = scores[match.kind];
      if (current === undefined) {
        scores[match.kind] = match.score;
      } else if (this.policy.selection === 'sum') {
        scores[match.kind] = current + match.score;
      } else {
        scores[match.kind] = Math.max(current, match.score);
      }
    }

    return scores;
  }

  score(analysis: MoveAnalysis, kindScores: KindScores = this.kindScores(analysis.matches)): number {
    const { weights } = this.policy;
    const bonuses =
      (analysis.createsPromotion ? weights.PROMOTION_BONUS : 0) +
      (analysis.givesCheck ? weights.CHECK_BONUS : 0);

    switch (this.policy.aggregation) {
      case 'weighted':
        return this._weightedScore(kindScores, weights) + bonuses;

      case 'sum':
        return SCORED_KINDS.reduce((sum, kind) => sum + (kindScores[kind] ?? 0), 0) + bonuses;

      case 'max': {
        const candidates: number[] = SCORED_KINDS.flatMap((kind) => {
          const value = kindScores[kind];
          return value === undefined ? [] : [value];
        });
        if (analysis.createsPromotion) candidates.push(weights.PROMOTION_BONUS);
        if (analysis.givesCheck) candidates.push(weights.CHECK_BONUS);

        // Largest magnitude wins; on a tie the positive value
        return candidates.reduce(
          (best, value) =>
            Math.abs(value) > Math.abs(best) || (Math.abs(value) === Math.abs(best) && value > best)
              ? value
              : best,
          0
        );
      }
    }
  }

  /**
   * Baseline + scaled score per tactic, counted only when the tactic scores above zero
   */
  private _weightedScore(kindScores: KindScores, weights: OrderingWeights): number {
    const bases: Record<ScoredPatternKind, number> = {
      [PatternKind.ABSOLUTE_PIN]: weights.ABSOLUTE_PIN_BASE,
      [PatternKind.RELATIVE_PIN]: weights.RELATIVE_PIN_BASE,
      [PatternKind.FORK]: weights.FORK_BASE,
      [PatternKind.SKEWER]: weights.SKEWER_BASE,
      [PatternKind.CAPTURE]: weights.CAPTURE_BASE,
    };

    let total = 0;
    for (const kind of SCORED_KINDS) {
      const value = kindScores[kind];
      if (value !== undefined && value > 0) {
        total += bases[kind] + value * weights.SCORE_MULTIPLIER;
      }
    }
    return total;
  }
}
