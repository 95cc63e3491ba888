/**
 * Pattern detector contract
 *
 * A detector looks at a board and one candidate move and returns every match
 * it can find, best first. Detectors are pure: unmet preconditions give an
 * empty array, never an exception.
 */

import type { BoardFactStore } from '../board/BoardFactStore.js';
import { compareSquares } from '../board/squares.js';
import { BoardGeometry } from '../geometry/BoardGeometry.js';
import type { Move, PatternKind, PatternMatch, Piece } from '../types/index.js';

export interface PatternDetector {
  readonly kind: PatternKind;
  detect(board: BoardFactStore, move: Move, geometry?: BoardGeometry): PatternMatch[];
}

/**
 * The piece making the move, if the origin is occupied
 */
export function moverOf(board: BoardFactStore, move: Move): Piece | undefined {
  return board.pieceAt(move.from);
}

/**
 * Geometry for a single call when the caller did not share one
 */
export function geometryFor(board: BoardFactStore, geometry?: BoardGeometry): BoardGeometry {
  if (geometry && geometry.board === board) {
    return geometry;
  }
  return new BoardGeometry(board, { memoize: false });
}

/**
 * Highest score first; equal scores ordered by the squares involved
 */
export function sortMatches(matches: PatternMatch[]): PatternMatch[] {
  return matches.sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    const len = Math.min(a.squares.length, b.squares.length);
    for (let i = 0; i < len; i++) {
      const cmp = compareSquares(a.squares[i], b.squares[i]);
      if (cmp !== 0) return cmp;
    }
    return a.squares.length - b.squares.length;
  });
}
