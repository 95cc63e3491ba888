/**
 * Fork Detector
 *
 * From its destination the moved piece attacks two or more enemy kings,
 * queens or rooks at once. Every unordered pair of attacked targets is a match.
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { oppositeColor, squaresEqual } from '../board/squares.js';
import { HIGH_VALUE_TARGETS, PIECE_VALUES } from '../config/constants.js';
import type { BoardGeometry } from '../geometry/BoardGeometry.js';
import { PatternKind, type Move, type PatternMatch } from '../types/index.js';
import { geometryFor, moverOf, sortMatches, type PatternDetector } from './PatternDetector.js';

export class ForkDetector implements PatternDetector {
  readonly kind = PatternKind.FORK;

  /**
   * Score = target1 + target2 - attacker
   */
  detect(board: BoardFactStore, move: Move, geometry?: BoardGeometry): PatternMatch[] {
    const mover = moverOf(board, move);
    if (!mover) {
      return [];
    }

    const geo = geometryFor(board, geometry);
    const { from, to } = move;

    // The piece on `to` (if any) is the one being captured, not a target
    const targets = board
      .piecesOf(oppositeColor(mover.color))
      .filter(
        (p) =>
          HIGH_VALUE_TARGETS.includes(p.type) &&
          !squaresEqual(p.square, from) &&
          !squaresEqual(p.square, to) &&
          geo.canAttackIgnoring(mover.type, mover.color, to, p.square, from)
      );

    const attackerValue = PIECE_VALUES[mover.type];
    const matches: PatternMatch[] = [];

    for (let i = 0; i < targets.length; i++) {
      for (let j = i + 1; j < targets.length; j++) {
        const [first, second] =
          PIECE_VALUES[targets[j].type] > PIECE_VALUES[targets[i].type]
            ? [targets[j], targets[i]]
            : [targets[i], targets[j]];

        matches.push({
          kind: this.kind,
          score: PIECE_VALUES[first.type] + PIECE_VALUES[second.type] - attackerValue,
          squares: [first.square, second.square],
        });
      }
    }

    return sortMatches(matches);
  }
}
