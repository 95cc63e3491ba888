import { describe, it, expect } from 'vitest';
import { BoardGeometry, canAttackIgnoring } from '../BoardGeometry.js';
import { board, sq } from '../../test-support/boards.js';

describe('canAttackIgnoring', () => {
  it('lets a white pawn attack an enemy diagonally forward only', () => {
    const b = board('wPe4', 'bNd5', 'bNf3', 'wNf5');
    expect(canAttackIgnoring(b, 'p', 'white', sq('e4'), sq('d5'), sq('a1'))).toBe(true);
    // Backwards
    expect(canAttackIgnoring(b, 'p', 'white', sq('e4'), sq('f3'), sq('a1'))).toBe(false);
    // Own piece
    expect(canAttackIgnoring(b, 'p', 'white', sq('e4'), sq('f5'), sq('a1'))).toBe(false);
    // Empty square
    expect(canAttackIgnoring(b, 'p', 'white', sq('e4'), sq('e5'), sq('a1'))).toBe(false);
  });

  it('moves black pawns down the board', () => {
    const b = board('bPe5', 'wRd4', 'wRd6');
    expect(canAttackIgnoring(b, 'p', 'black', sq('e5'), sq('d4'), sq('a1'))).toBe(true);
    expect(canAttackIgnoring(b, 'p', 'black', sq('e5'), sq('d6'), sq('a1'))).toBe(false);
  });

  it('lets knights jump over pieces', () => {
    const b = board('wPb2', 'wPc2', 'wPa2');
    expect(canAttackIgnoring(b, 'n', 'white', sq('b1'), sq('c3'), sq('h8'))).toBe(true);
    expect(canAttackIgnoring(b, 'n', 'white', sq('b1'), sq('b3'), sq('h8'))).toBe(false);
  });

  it('keeps sliders on their own lines', () => {
    const b = board();
    expect(canAttackIgnoring(b, 'b', 'white', sq('c1'), sq('h6'), sq('a1'))).toBe(true);
    expect(canAttackIgnoring(b, 'b', 'white', sq('c1'), sq('c8'), sq('a1'))).toBe(false);
    expect(canAttackIgnoring(b, 'r', 'white', sq('a1'), sq('a8'), sq('h1'))).toBe(true);
    expect(canAttackIgnoring(b, 'r', 'white', sq('a1'), sq('h8'), sq('h1'))).toBe(false);
    expect(canAttackIgnoring(b, 'q', 'white', sq('d1'), sq('h5'), sq('a1'))).toBe(true);
    expect(canAttackIgnoring(b, 'q', 'white', sq('d1'), sq('e3'), sq('a1'))).toBe(false);
  });

  it('sees through the excluded square but not other blockers', () => {
    const b = board('wRe2', 'bPe5');
    expect(canAttackIgnoring(b, 'r', 'white', sq('e1'), sq('e4'), sq('e2'))).toBe(true);
    expect(canAttackIgnoring(b, 'r', 'white', sq('e1'), sq('e4'), sq('a1'))).toBe(false);
    expect(canAttackIgnoring(b, 'r', 'white', sq('e1'), sq('e8'), sq('e2'))).toBe(false);
  });

  it('limits kings to neighbouring squares', () => {
    const b = board();
    expect(canAttackIgnoring(b, 'k', 'black', sq('e8'), sq('d7'), sq('a1'))).toBe(true);
    expect(canAttackIgnoring(b, 'k', 'black', sq('e8'), sq('e6'), sq('a1'))).toBe(false);
    expect(canAttackIgnoring(b, 'k', 'black', sq('e8'), sq('e8'), sq('a1'))).toBe(false);
  });
});

describe('BoardGeometry', () => {
  const b = board('wPc3', 'bPf6', 'wRh1');

  it('answers the same with and without memoization', () => {
    const cached = new BoardGeometry(b);
    const uncached = new BoardGeometry(b, { memoize: false });
    const queries: Array<[string, string, string | undefined]> = [
      ['a1', 'h8', undefined],
      ['a1', 'h8', 'c3'],
      ['a1', 'e5', 'c3'],
      ['h1', 'h8', 'h1'],
      ['a1', 'b3', undefined],
    ];

    for (const [a, c, excluded] of queries) {
      const ex = excluded ? sq(excluded) : undefined;
      expect(cached.pathClearIgnoring(sq(a), sq(c), ex)).toBe(
        uncached.pathClearIgnoring(sq(a), sq(c), ex)
      );
    }
  });

  it('counts cache hits for repeated queries', () => {
    const geometry = new BoardGeometry(b);
    geometry.pathClearIgnoring(sq('a1'), sq('e5'), sq('c3'));
    geometry.pathClearIgnoring(sq('a1'), sq('e5'), sq('c3'));
    geometry.pathClearIgnoring(sq('a1'), sq('e5'));

    expect(geometry.cacheStats()).toEqual({ hits: 1, misses: 2 });
  });

  it('does not touch the cache when memoization is off', () => {
    const geometry = new BoardGeometry(b, { memoize: false });
    geometry.pathClearIgnoring(sq('a1'), sq('e5'));
    geometry.pathClearIgnoring(sq('a1'), sq('e5'));

    expect(geometry.cacheStats()).toEqual({ hits: 0, misses: 0 });
  });
});
