// =============================================================================
// SHROUD — Redaction Routes
//
// Routes:
//   POST /api/redact/vision   — [Advanced] remote model-backed engine
//   POST /api/redact/classic  — [Fast] local rules + name heuristics
//
// Multipart form data:
//   file     — the document (required)
//   severity — integer 1–5 (required)
//
// Response: the redacted file, with headers
//   X-Document-ID      — session handle
//   X-Decryption-Key   — one-time key (only when items were stored)
//   X-Redaction-Count  — number of items removed
// =============================================================================

import { Router, Request, Response, RequestHandler } from 'express';
import { EngineVariant, MIN_SEVERITY, MAX_SEVERITY } from '../types/engine';
import { requestSanitization } from '../middleware/security';
import { TempFileScope } from '../services/files/temp-scope';
import { redactDocument, SessionContext } from '../services/session';
import { sendInvalidRequest, sendSessionError } from './errors';

export const DOCUMENT_ID_HEADER = 'X-Document-ID';
export const DECRYPTION_KEY_HEADER = 'X-Decryption-Key';
export const REDACTION_COUNT_HEADER = 'X-Redaction-Count';

/** Severity from a form field: a plain integer within bounds, else null. */
export function parseSeverity(raw: unknown): number | null {
  if (typeof raw !== 'string' || !/^\s*\d+\s*$/.test(raw)) return null;
  const severity = parseInt(raw, 10);
  return severity >= MIN_SEVERITY && severity <= MAX_SEVERITY ? severity : null;
}

export interface RedactionRouterDeps {
  session: SessionContext;
  upload: RequestHandler;
  uploadDir: string;
}

export function createRedactionRouter(deps: RedactionRouterDeps): Router {
  const router = Router();

  const redactWith = (variant: EngineVariant): RequestHandler =>
    async (req: Request, res: Response) => {
      const scope = new TempFileScope(deps.uploadDir);
      res.once('close', () => scope.release());

      try {
        if (!req.file) {
          sendInvalidRequest(res, 'File is required');
          return;
        }
        scope.track(req.file.path);

        const severity = parseSeverity(req.body.severity);
        if (severity === null) {
          sendInvalidRequest(res, `severity must be an integer from ${MIN_SEVERITY} to ${MAX_SEVERITY}`);
          return;
        }

        const downloadName = `redacted_${req.file.originalname}`;
        const result = await redactDocument(deps.session, {
          variant,
          filePath: req.file.path,
          severity,
          outputPath: scope.allocate(downloadName),
        });

        if (!result.ok) {
          sendSessionError(res, result.error);
          return;
        }

        const session = result.value;
        res.set(DOCUMENT_ID_HEADER, session.documentId);
        res.set(REDACTION_COUNT_HEADER, String(session.itemCount));
        if (session.encodedKey) {
          res.set(DECRYPTION_KEY_HEADER, session.encodedKey);
        }
        res.type(req.file.mimetype || 'application/octet-stream');

        res.download(session.artifactPath, downloadName, (err) => {
          if (err) {
            console.error(`[Redact] ${req.requestId ?? '-'} artifact delivery failed: ${err.message}`);
          }
        });
      } catch (err: unknown) {
        console.error(`[Redact] ${req.requestId ?? '-'} ${variant} error:`, err instanceof Error ? err.message : err);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Internal server error', code: 'InternalError' });
        }
      }
    };

  router.post('/vision', deps.upload, requestSanitization(), redactWith('vision'));
  router.post('/classic', deps.upload, requestSanitization(), redactWith('classic'));

  return router;
}
