/**
 * Zod validation schemas for API requests
 */

import { z } from 'zod';
import { config } from '../config/index.js';

const algebraicSquare = z
  .string()
  .regex(/^[a-h][1-8]$/, 'Square must be algebraic, e.g. "e4"');

const uciMove = z
  .string()
  .regex(/^[a-h][1-8][a-h][1-8][qrbnQRBN]?$/, 'Move must be UCI, e.g. "e2e4" or "e7e8q"');

const nonNegativeInt = z.number().int().min(0).max(10000);

export const scoringPolicySchema = z
  .object({
    selection: z.enum(['best', 'sum']).optional(),
    aggregation: z.enum(['weighted', 'sum', 'max']).optional(),
    weights: z
      .object({
        ABSOLUTE_PIN_BASE: nonNegativeInt,
        RELATIVE_PIN_BASE: nonNegativeInt,
        FORK_BASE: nonNegativeInt,
        SKEWER_BASE: nonNegativeInt,
        CAPTURE_BASE: nonNegativeInt,
        SCORE_MULTIPLIER: z.number().int().min(1).max(100),
        PROMOTION_BONUS: nonNegativeInt,
        CHECK_BONUS: nonNegativeInt,
      })
      .partial()
      .optional(),
  })
  .strict();

export const positionRequestSchema = z.object({
  fen: z.string().min(1, 'FEN is required').max(100, 'FEN is too long'),
  moves: z.array(uciMove).min(1).max(config.maxMovesPerRequest).optional(),
  policy: scoringPolicySchema.optional(),
});

export const pieceSchema = z.object({
  type: z.enum(['p', 'n', 'b', 'r', 'q', 'k']),
  color: z.enum(['white', 'black']),
  square: algebraicSquare,
});

export const boardRequestSchema = z.object({
  pieces: z.array(pieceSchema).max(64),
  moves: z
    .array(
      z.object({
        uci: uciMove,
        givesCheck: z.boolean().optional(),
      })
    )
    .min(1)
    .max(config.maxMovesPerRequest),
  policy: scoringPolicySchema.optional(),
});

export function validateRequest<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): { success: true; data: T } | { success: false; errors: z.ZodError } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}
