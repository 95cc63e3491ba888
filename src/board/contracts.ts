/**
 * Caller-contract checks for moves handed to the engine.
 *
 * The move generator upstream guarantees well-formed input; these checks only
 * run when contract assertions are enabled.
 */

import type { Move } from '../types/index.js';
import { EngineContractError } from '../utils/errors.js';
import type { BoardFactStore } from './BoardFactStore.js';
import { formatSquare, isOnBoard } from './squares.js';

export function assertWellFormedMove(board: BoardFactStore, move: Move): void {
  if (!isOnBoard(move.from) || !isOnBoard(move.to)) {
    throw new EngineContractError('Move square is off the board', {
      from: move.from,
      to: move.to,
    });
  }
  if (!board.isOccupied(move.from)) {
    throw new EngineContractError(`No piece on ${formatSquare(move.from)}`, {
      from: formatSquare(move.from),
      to: formatSquare(move.to),
    });
  }
}
