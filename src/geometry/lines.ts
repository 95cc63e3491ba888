/**
 * Line geometry on raw coordinates
 *
 * Rows, columns, diagonals and knight leaps. The only board-aware functions
 * here are the path queries, which need nothing but an occupancy test.
 */

import type { LineType, PieceType, Square } from '../types/index.js';
import { squaresEqual } from '../board/squares.js';

export interface Occupancy {
  isOccupied(sq: Square): boolean;
}

const SLIDING_LINES: Partial<Record<PieceType, readonly LineType[]>> = {
  b: ['diagonal'],
  r: ['row', 'column'],
  q: ['row', 'column', 'diagonal'],
};

export function sameRow(a: Square, b: Square): boolean {
  return a.row === b.row;
}

export function sameColumn(a: Square, b: Square): boolean {
  return a.col === b.col;
}

export function sameDiagonal(a: Square, b: Square): boolean {
  const dr = Math.abs(b.row - a.row);
  return dr !== 0 && dr === Math.abs(b.col - a.col);
}

/**
 * Which line joins two distinct squares, if any
 */
export function lineBetween(a: Square, b: Square): LineType | null {
  if (squaresEqual(a, b)) return null;
  if (sameRow(a, b)) return 'row';
  if (sameColumn(a, b)) return 'column';
  if (sameDiagonal(a, b)) return 'diagonal';
  return null;
}

/**
 * Squares strictly between a and b, walking from a. Empty when they share no line.
 */
export function squaresBetween(a: Square, b: Square): Square[] {
  if (lineBetween(a, b) === null) return [];

  const stepR = Math.sign(b.row - a.row);
  const stepC = Math.sign(b.col - a.col);
  const distance = Math.max(Math.abs(b.row - a.row), Math.abs(b.col - a.col));

  const between: Square[] = [];
  for (let i = 1; i < distance; i++) {
    between.push({ row: a.row + i * stepR, col: a.col + i * stepC });
  }
  return between;
}

/**
 * a, b, c lie on one row, column or diagonal, in that order, b strictly inside
 */
export function onSameLine(a: Square, b: Square, c: Square): boolean {
  return squaresBetween(a, c).some((sq) => squaresEqual(sq, b));
}

export function knightReachable(a: Square, b: Square): boolean {
  const dr = Math.abs(b.row - a.row);
  const dc = Math.abs(b.col - a.col);
  return (dr === 1 && dc === 2) || (dr === 2 && dc === 1);
}

export function kingAdjacent(a: Square, b: Square): boolean {
  return !squaresEqual(a, b) && Math.abs(b.row - a.row) <= 1 && Math.abs(b.col - a.col) <= 1;
}

export function isSlider(type: PieceType): boolean {
  return SLIDING_LINES[type] !== undefined;
}

export function slidesAlong(type: PieceType, line: LineType): boolean {
  return SLIDING_LINES[type]?.includes(line) ?? false;
}

/**
 * No occupied square strictly between a and b, except `excluded`.
 * False when a and b share no line.
 */
export function pathClearIgnoring(
  board: Occupancy,
  a: Square,
  b: Square,
  excluded?: Square
): boolean {
  if (lineBetween(a, b) === null) return false;

  return squaresBetween(a, b).every(
    (sq) => !board.isOccupied(sq) || (excluded !== undefined && squaresEqual(sq, excluded))
  );
}

export function pathClear(board: Occupancy, a: Square, b: Square): boolean {
  return pathClearIgnoring(board, a, b);
}
