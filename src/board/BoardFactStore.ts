/**
 * BoardFactStore - immutable piece placement for one search node
 *
 * Built once per node by the caller and only read afterwards. Every detector
 * receives it as a parameter; nothing in the engine keeps a reference past
 * a single call.
 */

import type { Color, Piece, Square } from '../types/index.js';
import { BoardContractError } from '../utils/errors.js';
import { formatSquare, isOnBoard, squareIndex } from './squares.js';

export class BoardFactStore {
  private readonly bySquare: ReadonlyMap<number, Piece>;
  private readonly all: readonly Piece[];

  private constructor(pieces: readonly Piece[]) {
    const bySquare = new Map<number, Piece>();

    for (const piece of pieces) {
      if (!isOnBoard(piece.square)) {
        throw new BoardContractError(
          `Piece ${piece.color} ${piece.type} is off the board`,
          { square: piece.square }
        );
      }
      const key = squareIndex(piece.square);
      if (bySquare.has(key)) {
        throw new BoardContractError(
          `Two pieces on ${formatSquare(piece.square)}`,
          { square: formatSquare(piece.square) }
        );
      }
      bySquare.set(key, Object.freeze({ ...piece, square: Object.freeze({ ...piece.square }) }));
    }

    this.bySquare = bySquare;
    // Board order (a1, b1, ..., h8) so every enumeration is deterministic
    this.all = Object.freeze([...bySquare.entries()].sort(([a], [b]) => a - b).map(([, p]) => p));
  }

  static fromPieces(pieces: Iterable<Piece>): BoardFactStore {
    return new BoardFactStore([...pieces]);
  }

  static empty(): BoardFactStore {
    return new BoardFactStore([]);
  }

  pieceAt(sq: Square): Piece | undefined {
    if (!isOnBoard(sq)) return undefined;
    return this.bySquare.get(squareIndex(sq));
  }

  isOccupied(sq: Square): boolean {
    return this.pieceAt(sq) !== undefined;
  }

  pieces(): readonly Piece[] {
    return this.all;
  }

  piecesOf(color: Color): Piece[] {
    return this.all.filter((p) => p.color === color);
  }

  /**
   * Every king of a color. Usually one, but the store does not enforce it.
   */
  kingsOf(color: Color): Piece[] {
    return this.all.filter((p) => p.color === color && p.type === 'k');
  }
}
