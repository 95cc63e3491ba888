/**
 * chess.js adapter
 *
 * chess.js owns the rules: FEN parsing, legal move generation and check
 * detection. This module turns its view of a position into a BoardFactStore
 * and CandidateMove list for the pattern engine.
 */

import { Chess, type Color as ChessJsColor, type Move as ChessJsMove } from 'chess.js';
import type { CandidateMove, Color, Move, Piece, PieceType } from '../types/index.js';
import { IllegalMoveError, InvalidPositionError } from '../utils/errors.js';
import { BoardFactStore } from './BoardFactStore.js';
import { formatMove, parseSquare } from './squares.js';

const UCI_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;
const PROMOTION_PIECES: readonly PieceType[] = ['q', 'r', 'b', 'n'];

export interface ParsedPosition {
  readonly fen: string;
  readonly board: BoardFactStore;
  readonly sideToMove: Color;
  readonly candidates: CandidateMove[];
}

function toColor(color: ChessJsColor): Color {
  return color === 'w' ? 'white' : 'black';
}

function loadChess(fen: string): Chess {
  try {
    return new Chess(fen);
  } catch (error) {
    throw new InvalidPositionError(
      error instanceof Error ? error.message : 'Invalid FEN',
      { fen }
    );
  }
}

function boardFromChess(chess: Chess): BoardFactStore {
  const pieces: Piece[] = [];

  for (const rank of chess.board()) {
    for (const cell of rank) {
      if (!cell) continue;
      const sq = parseSquare(cell.square);
      if (!sq) {
        throw new InvalidPositionError(`Unexpected square ${cell.square}`);
      }
      pieces.push({ type: cell.type, color: toColor(cell.color), square: sq });
    }
  }

  return BoardFactStore.fromPieces(pieces);
}

function toCandidate(move: ChessJsMove): CandidateMove {
  const from = parseSquare(move.from);
  const to = parseSquare(move.to);
  if (!from || !to) {
    throw new InvalidPositionError(`Unexpected move ${move.from}${move.to}`);
  }

  return {
    from,
    to,
    promotion: move.promotion,
    givesCheck: move.san.endsWith('+') || move.san.endsWith('#'),
  };
}

export function boardFromFen(fen: string): BoardFactStore {
  return boardFromChess(loadChess(fen));
}

/**
 * Board plus legal candidate moves. With `uciMoves`, only those moves are
 * returned, in the order given, and each must be legal.
 */
export function parsePosition(fen: string, uciMoves?: readonly string[]): ParsedPosition {
  const chess = loadChess(fen);
  const legal = chess.moves({ verbose: true }).map(toCandidate);

  let candidates = legal;
  if (uciMoves) {
    const byUci = new Map(legal.map((m) => [formatMove(m), m] as const));
    candidates = uciMoves.map((uci) => {
      const candidate = byUci.get(uci.toLowerCase());
      if (!candidate) {
        throw new IllegalMoveError(`Move ${uci} is not legal in this position`, { fen, move: uci });
      }
      return candidate;
    });
  }

  return {
    fen: chess.fen(),
    board: boardFromChess(chess),
    sideToMove: toColor(chess.turn()),
    candidates,
  };
}

/**
 * "e7e8q" -> Move, or null when the string is not UCI
 */
export function parseUciMove(uci: string): Move | null {
  const match = UCI_PATTERN.exec(uci.toLowerCase());
  if (!match) return null;

  const from = parseSquare(match[1]);
  const to = parseSquare(match[2]);
  if (!from || !to) return null;

  const promotion = PROMOTION_PIECES.find((p) => p === match[3]);
  return promotion ? { from, to, promotion } : { from, to };
}
