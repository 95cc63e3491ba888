import { describe, it, expect } from 'vitest';
import { SkewerDetector } from '../SkewerDetector.js';
import { PatternKind } from '../../types/index.js';
import { board, mv, sq } from '../../test-support/boards.js';

describe('SkewerDetector', () => {
  const detector = new SkewerDetector();

  it('scores a rook skewering king and queen', () => {
    const b = board('wRa1', 'bKe5', 'bQe8');

    expect(detector.detect(b, mv('a1e1'))).toEqual([
      { kind: PatternKind.SKEWER, score: 104, squares: [sq('e5'), sq('e8')] },
    ]);
  });

  it('looks through the vacated origin', () => {
    const b = board('wQe3', 'bKe5', 'bRe7');

    expect(detector.detect(b, mv('e3e1'))).toEqual([
      { kind: PatternKind.SKEWER, score: 96, squares: [sq('e5'), sq('e7')] },
    ]);
  });

  it('needs a king, queen or rook in front', () => {
    expect(detector.detect(board('wRa1', 'bBe5', 'bPe8'), mv('a1e1'))).toEqual([]);
  });

  it('does not compare the front and behind values', () => {
    expect(detector.detect(board('wQa1', 'bRe5', 'bRe8'), mv('a1e1'))).toEqual([
      { kind: PatternKind.SKEWER, score: 1, squares: [sq('e5'), sq('e8')] },
    ]);
    expect(detector.detect(board('wBa1', 'bRe5', 'bQh8'), mv('a1c3'))).toEqual([
      { kind: PatternKind.SKEWER, score: 11, squares: [sq('e5'), sq('h8')] },
    ]);
  });

  it('leaves a king behind to the pin detector', () => {
    expect(detector.detect(board('wRh1', 'bQe4', 'bKe8'), mv('h1e1'))).toEqual([]);
  });

  it('skewers along any line, whatever the slider moves on', () => {
    expect(detector.detect(board('wBd2', 'bQe6', 'bRe8'), mv('d2e3'))).toEqual([
      { kind: PatternKind.SKEWER, score: 11, squares: [sq('e6'), sq('e8')] },
    ]);
  });

  it('needs a clear line behind the front piece', () => {
    expect(detector.detect(board('wRa1', 'bKe5', 'wPe6', 'bQe8'), mv('a1e1'))).toEqual([]);
  });

  it('ignores non-sliders', () => {
    expect(detector.detect(board('wKd1', 'bKe5', 'bQe8'), mv('d1e1'))).toEqual([]);
  });
});
