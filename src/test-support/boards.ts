/**
 * Test helpers - compact board and move construction
 *
 * Pieces are written as color + piece + square: "wBc1", "bKe8".
 */

import { BoardFactStore } from '../board/BoardFactStore.js';
import { parseUciMove } from '../board/chessJsAdapter.js';
import { parseSquare } from '../board/squares.js';
import type { Color, Move, Piece, PieceType, Square } from '../types/index.js';

const PIECE_LETTERS: Record<string, PieceType> = {
  P: 'p',
  N: 'n',
  B: 'b',
  R: 'r',
  Q: 'q',
  K: 'k',
};

export function sq(name: string): Square {
  const parsed = parseSquare(name);
  if (!parsed) throw new Error(`Bad square in test: ${name}`);
  return parsed;
}

export function piece(code: string): Piece {
  const color: Color | undefined = code[0] === 'w' ? 'white' : code[0] === 'b' ? 'black' : undefined;
  const type = PIECE_LETTERS[code[1]];
  if (!color || !type) throw new Error(`Bad piece in test: ${code}`);
  return { type, color, square: sq(code.slice(2)) };
}

export function board(...codes: string[]): BoardFactStore {
  return BoardFactStore.fromPieces(codes.map(piece));
}

export function mv(uci: string): Move {
  const parsed = parseUciMove(uci);
  if (!parsed) throw new Error(`Bad move in test: ${uci}`);
  return parsed;
}
