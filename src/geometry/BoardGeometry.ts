/**
 * BoardGeometry - line-of-sight and attack queries bound to one board snapshot
 *
 * The same path queries repeat across candidate moves and detectors at a
 * node, so results can be memoized for the lifetime of the node. Answers are
 * identical with or without the cache.
 */

import { BoardFactStore } from '../board/BoardFactStore.js';
import { oppositeColor, squareIndex } from '../board/squares.js';
import { PAWN_DIRECTION } from '../config/constants.js';
import type { Color, PieceType, Square } from '../types/index.js';
import {
  kingAdjacent,
  knightReachable,
  lineBetween,
  pathClearIgnoring,
  slidesAlong,
} from './lines.js';

export interface BoardGeometryOptions {
  memoize?: boolean;
}

export interface GeometryCacheStats {
  hits: number;
  misses: number;
}

export class BoardGeometry {
  private readonly memoize: boolean;
  private readonly pathCache = new Map<number, boolean>();
  private hits = 0;
  private misses = 0;

  constructor(
    readonly board: BoardFactStore,
    options: BoardGeometryOptions = {}
  ) {
    this.memoize = options.memoize ?? true;
  }

  /**
   * Path query with `excluded` treated as vacant
   */
  pathClearIgnoring(a: Square, b: Square, excluded?: Square): boolean {
    if (!this.memoize) {
      return pathClearIgnoring(this.board, a, b, excluded);
    }

    // 64 * 64 * 65 keys; 64 stands for "nothing excluded"
    const key = (squareIndex(a) * 64 + squareIndex(b)) * 65 + (excluded ? squareIndex(excluded) : 64);
    const cached = this.pathCache.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const clear = pathClearIgnoring(this.board, a, b, excluded);
    this.pathCache.set(key, clear);
    return clear;
  }

  /**
   * Can a piece of this type and color standing on `from` attack `to`,
   * assuming `excluded` is empty
   */
  canAttackIgnoring(
    type: PieceType,
    color: Color,
    from: Square,
    to: Square,
    excluded: Square
  ): boolean {
    switch (type) {
      case 'p': {
        // Pawns only count as attacking an enemy piece diagonally forward
        const target = this.board.pieceAt(to);
        return (
          to.row === from.row + PAWN_DIRECTION[color] &&
          Math.abs(to.col - from.col) === 1 &&
          target !== undefined &&
          target.color === oppositeColor(color)
        );
      }
      case 'n':
        return knightReachable(from, to);
      case 'k':
        return kingAdjacent(from, to);
      case 'b':
      case 'r':
      case 'q': {
        const line = lineBetween(from, to);
        return line !== null && slidesAlong(type, line) && this.pathClearIgnoring(from, to, excluded);
      }
    }
  }

  cacheStats(): GeometryCacheStats {
    return { hits: this.hits, misses: this.misses };
  }
}

/**
 * One-off attack query without a per-node cache
 */
export function canAttackIgnoring(
  board: BoardFactStore,
  type: PieceType,
  color: Color,
  from: Square,
  to: Square,
  excluded: Square
): boolean {
  return new BoardGeometry(board, { memoize: false }).canAttackIgnoring(type, color, from, to, excluded);
}
