/**
 * MoveOrderer - best-first ordering of analysed candidate moves
 */

import type { MoveAnalysis, ScoredMove } from '../types/index.js';
import { MoveScorer } from './MoveScorer.js';

export class MoveOrderer {
  constructor(private readonly scorer: MoveScorer = new MoveScorer()) {}

  score(analysis: MoveAnalysis): ScoredMove {
    const kindScores = this.scorer.kindScores(analysis.matches);
    return {
      move: analysis.move,
      analysis,
      kindScores,
      score: this.scorer.score(analysis, kindScores),
    };
  }

  /**
   * Highest score first. Equal scores keep the generator's order.
   */
  order(analyses: readonly MoveAnalysis[]): ScoredMove[] {
    return analyses
      .map((analysis, index) => ({ scored: this.score(analysis), index }))
      .sort((a, b) => b.scored.score - a.scored.score || a.index - b.index)
      .map(({ scored }) => scored);
  }
}
