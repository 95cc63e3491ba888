/**
 * Skewer Detector
 *
 * The moved slider lines up a king, queen or rook in front of another enemy
 * piece. A king behind is a pin, not a skewer.
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { HIGH_VALUE_TARGETS, PIECE_VALUES } from '../config/constants.js';
import type { BoardGeometry } from '../geometry/BoardGeometry.js';
import { isSlider } from '../geometry/lines.js';
import { PatternKind, type Move, type PatternMatch } from '../types/index.js';
import { findLineTriples } from './lineTriples.js';
import { geometryFor, moverOf, sortMatches, type PatternDetector } from './PatternDetector.js';

export class SkewerDetector implements PatternDetector {
  readonly kind = PatternKind.SKEWER;

  /**
   * Score = front + behind - attacker
   */
  detect(board: BoardFactStore, move: Move, geometry?: BoardGeometry): PatternMatch[] {
    const mover = moverOf(board, move);
    if (!mover || !isSlider(mover.type)) {
      return [];
    }

    const matches = findLineTriples(geometryFor(board, geometry), move, mover)
      .filter(
        ({ front, behind }) => HIGH_VALUE_TARGETS.includes(front.type) && behind.type !== 'k'
      )
      .map(({ front, behind }) => ({
        kind: this.kind,
        score: PIECE_VALUES[front.type] + PIECE_VALUES[behind.type] - PIECE_VALUES[mover.type],
        squares: [front.square, behind.square],
      }));

    return sortMatches(matches);
  }
}
