/**
 * Capture Detector - MVV-LVA (Most Valuable Victim, Least Valuable Attacker)
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { MVV_LVA_VALUES, MVV_LVA_VICTIM_MULTIPLIER } from '../config/constants.js';
import { PatternKind, type Move, type PatternMatch } from '../types/index.js';
import { moverOf, type PatternDetector } from './PatternDetector.js';

export class CaptureDetector implements PatternDetector {
  readonly kind = PatternKind.CAPTURE;

  /**
   * Score = 10 * victim - attacker, king counted as 10
   */
  detect(board: BoardFactStore, move: Move): PatternMatch[] {
    const attacker = moverOf(board, move);
    const victim = board.pieceAt(move.to);

    if (!attacker || !victim || victim.color === attacker.color) {
      return [];
    }

    return [
      {
        kind: this.kind,
        score: MVV_LVA_VICTIM_MULTIPLIER * MVV_LVA_VALUES[victim.type] - MVV_LVA_VALUES[attacker.type],
        squares: [victim.square],
      },
    ];
  }
}
