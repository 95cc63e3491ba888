/**
 * Relative Pin Detector
 *
 * Like an absolute pin, but the piece behind is a non-king worth more than
 * both the pinned piece and the pinner.
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { PIECE_VALUES } from '../config/constants.js';
import type { BoardGeometry } from '../geometry/BoardGeometry.js';
import { isSlider } from '../geometry/lines.js';
import { PatternKind, type Move, type PatternMatch } from '../types/index.js';
import { findLineTriples } from './lineTriples.js';
import { geometryFor, moverOf, sortMatches, type PatternDetector } from './PatternDetector.js';

export class RelativePinDetector implements PatternDetector {
  readonly kind = PatternKind.RELATIVE_PIN;

  detect(board: BoardFactStore, move: Move, geometry?: BoardGeometry): PatternMatch[] {
    const mover = moverOf(board, move);
    if (!mover || !isSlider(mover.type)) {
      return [];
    }

    const pinnerValue = PIECE_VALUES[mover.type];
    const matches: PatternMatch[] = [];

    for (const { front, behind } of findLineTriples(geometryFor(board, geometry), move, mover)) {
      if (behind.type === 'k') continue;

      const pinnedValue = PIECE_VALUES[front.type];
      const targetValue = PIECE_VALUES[behind.type];
      if (targetValue <= pinnedValue || targetValue <= pinnerValue) continue;

      matches.push({
        kind: this.kind,
        score: Math.floor((pinnedValue + targetValue - pinnerValue) / 2),
        squares: [front.square, behind.square],
      });
    }

    return sortMatches(matches);
  }
}
