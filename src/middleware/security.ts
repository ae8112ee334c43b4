// =============================================================================
// SHROUD — Request Hardening Middleware
//
// Covers:
//   - Request IDs for log correlation
//   - Null-byte stripping of body fields
//   - Global error handler (upload limits, malformed JSON, no stack traces
//     in production)
// helmet, cors and express-rate-limit are mounted in app.ts.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import multer from 'multer';
import '../types/express';

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `req-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Sanitization ─────────────────────────────────────────────────

/**
 * Strip null bytes from string values in the body. Mounted globally for
 * JSON bodies and again after multer for multipart fields.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (req.body && typeof req.body === 'object') {
      req.body = sanitizeValue(req.body);
    }
    next();
  };
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') return value.replace(/\0/g, '');
  if (Array.isArray(value)) return value.map(sanitizeValue);
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [key, sanitizeValue(inner)])
    );
  }
  return value;
}

// ── Error Handler ──────────────────────────────────────────────────────

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Global error handler. Never leaks stack traces in production.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: `Upload rejected: ${err.message}`, code: err.code });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'InvalidRequest' });
      return;
    }

    const isProd = process.env.NODE_ENV === 'production';
    console.error(`[ERROR] ${req.requestId ?? '-'} ${err.message}`, isProd ? '' : err.stack);

    res.status(500).json({
      error: isProd ? 'Internal server error' : err.message,
      code: 'InternalError',
    });
  };
}
