/**
 * Engine error types
 *
 * Detectors never throw. These are raised at the boundaries: building a board,
 * contract assertions, and parsing positions from chess.js.
 */

export class EngineError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/** Off-board square or two pieces on one square */
export class BoardContractError extends EngineError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'BOARD_CONTRACT', details);
  }
}

/** Malformed move handed to the engine (off-board, empty origin) */
export class EngineContractError extends EngineError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'ENGINE_CONTRACT', details);
  }
}

/** FEN that chess.js refuses */
export class InvalidPositionError extends EngineError {
  constructor(message: string, details?: unknown) {
    super(message, 422, 'INVALID_POSITION', details);
  }
}

/** UCI move that is not legal in the given position */
export class IllegalMoveError extends EngineError {
  constructor(message: string, details?: unknown) {
    super(message, 422, 'ILLEGAL_MOVE', details);
  }
}
