/**
 * CORS middleware - only origins listed in ALLOWED_ORIGINS may call the API
 */

import cors from 'cors';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

const corsLogger = logger.child({ middleware: 'cors' });

export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some((allowed) => {
    // Any localhost port is fine when localhost is listed
    if (allowed.startsWith('http://localhost')) {
      return origin.startsWith('http://localhost');
    }
    return origin === allowed || origin.endsWith(allowed.replace('https://', '.'));
  });
}

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Search drivers call server-to-server without an Origin header
    if (!origin) {
      callback(null, true);
      return;
    }

    if (isOriginAllowed(origin, config.allowedOrigins)) {
      callback(null, true);
    } else {
      corsLogger.warn({ origin }, 'Blocked request from unauthorized origin');
      callback(createCorsError());
    }
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  maxAge: 86400, // 24 hours
});

function createCorsError(): Error {
  return Object.assign(new Error('Not allowed by CORS'), { statusCode: 403, code: 'CORS_REJECTED' });
}
