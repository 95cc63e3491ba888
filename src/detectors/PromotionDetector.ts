/**
 * Promotion Detector
 *
 * A flag rather than a score: the match carries score 0 and the move scorer
 * adds its own bonus.
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { PROMOTION_ROW } from '../config/constants.js';
import { PatternKind, type Move, type PatternMatch } from '../types/index.js';
import { moverOf, type PatternDetector } from './PatternDetector.js';

export class PromotionDetector implements PatternDetector {
  readonly kind = PatternKind.PROMOTION;

  detect(board: BoardFactStore, move: Move): PatternMatch[] {
    return this.createsPromotion(board, move)
      ? [{ kind: this.kind, score: 0, squares: [move.to] }]
      : [];
  }

  createsPromotion(board: BoardFactStore, move: Move): boolean {
    const mover = moverOf(board, move);
    return mover?.type === 'p' && move.to.row === PROMOTION_ROW[mover.color];
  }
}
