/**
 * Enumerates (front, behind) enemy pairs lined up behind a slider's destination.
 * Shared by the pin and skewer detectors. Any row, column or diagonal counts,
 * whatever lines the slider itself moves along.
 */

import { oppositeColor, squaresEqual } from '../board/squares.js';
import type { BoardGeometry } from '../geometry/BoardGeometry.js';
import { lineBetween, onSameLine } from '../geometry/lines.js';
import type { Move, Piece } from '../types/index.js';

export interface LineTriple {
  readonly front: Piece;
  readonly behind: Piece;
}

/**
 * All enemy pairs such that `to, front, behind` are colinear in that order,
 * with both segments clear once `from` is vacated. The mover is assumed to be
 * a slider.
 */
export function findLineTriples(geometry: BoardGeometry, move: Move, mover: Piece): LineTriple[] {
  const { from, to } = move;
  const enemies = geometry.board
    .piecesOf(oppositeColor(mover.color))
    .filter((p) => !squaresEqual(p.square, from));

  const triples: LineTriple[] = [];

  for (const front of enemies) {
    if (lineBetween(to, front.square) === null) continue;
    if (!geometry.pathClearIgnoring(to, front.square, from)) continue;

    for (const behind of enemies) {
      if (squaresEqual(behind.square, front.square)) continue;
      if (!onSameLine(to, front.square, behind.square)) continue;
      if (!geometry.pathClearIgnoring(front.square, behind.square, from)) continue;

      triples.push({ front, behind });
    }
  }

  return triples;
}
