/**
 * Absolute Pin Detector
 *
 * The moved slider, from its destination, lines up an enemy piece with the
 * enemy king behind it. The pinned piece cannot leave the line without
 * exposing the king.
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { PIECE_VALUES } from '../config/constants.js';
import type { BoardGeometry } from '../geometry/BoardGeometry.js';
import { isSlider } from '../geometry/lines.js';
import { PatternKind, type Move, type PatternMatch } from '../types/index.js';
import { findLineTriples } from './lineTriples.js';
import { geometryFor, moverOf, sortMatches, type PatternDetector } from './PatternDetector.js';

export class AbsolutePinDetector implements PatternDetector {
  readonly kind = PatternKind.ABSOLUTE_PIN;

  /**
   * Score = floor((pinned + king - pinner) / 2)
   */
  detect(board: BoardFactStore, move: Move, geometry?: BoardGeometry): PatternMatch[] {
    const mover = moverOf(board, move);
    if (!mover || !isSlider(mover.type)) {
      return [];
    }

    const matches = findLineTriples(geometryFor(board, geometry), move, mover)
      .filter(({ behind }) => behind.type === 'k')
      .map(({ front, behind }) => ({
        kind: this.kind,
        score: Math.floor(
          (PIECE_VALUES[front.type] + PIECE_VALUES.k - PIECE_VALUES[mover.type]) / 2
        ),
        squares: [front.square, behind.square],
      }));

    return sortMatches(matches);
  }
}
