/**
 * Square helpers - coordinates, keys and algebraic notation
 */

import { BOARD_SIZE } from '../config/constants.js';
import type { Color, Move, Square } from '../types/index.js';

const FILES = 'abcdefgh';

export function isOnBoard(sq: Square): boolean {
  return (
    Number.isInteger(sq.row) &&
    Number.isInteger(sq.col) &&
    sq.row >= 1 &&
    sq.row <= BOARD_SIZE &&
    sq.col >= 1 &&
    sq.col <= BOARD_SIZE
  );
}

export function squaresEqual(a: Square, b: Square): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Dense index 0..63, used as map key
 */
export function squareIndex(sq: Square): number {
  return (sq.row - 1) * BOARD_SIZE + (sq.col - 1);
}

export function oppositeColor(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

/**
 * "e4" -> { row: 4, col: 5 }. Returns null for anything that is not a square.
 */
export function parseSquare(name: string): Square | null {
  if (name.length !== 2) return null;
  const col = FILES.indexOf(name[0]) + 1;
  const row = Number(name[1]);
  const sq = { row, col };
  return col > 0 && isOnBoard(sq) ? sq : null;
}

export function formatSquare(sq: Square): string {
  return `${FILES[sq.col - 1]}${sq.row}`;
}

export function formatMove(move: Move): string {
  return `${formatSquare(move.from)}${formatSquare(move.to)}${move.promotion ?? ''}`;
}

/**
 * Total order used for deterministic tie-breaks
 */
export function compareSquares(a: Square, b: Square): number {
  return squareIndex(a) - squareIndex(b);
}
