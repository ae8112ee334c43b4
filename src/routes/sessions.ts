// =============================================================================
// SHROUD — Session Routes
//
// Routes:
//   POST /api/decrypt  — JSON { documentId, decryptionKey } → decrypted items
//   POST /api/restore  — multipart { file, documentId, decryptionKey }
//                        → reconstructed document
//
// Both read the same session entry written at redaction time.
// =============================================================================

import { Router, Request, Response, RequestHandler } from 'express';
import { requestSanitization } from '../middleware/security';
import { TempFileScope } from '../services/files/temp-scope';
import { decryptSession, restoreDocument } from '../services/session';
import { MetadataStore } from '../services/store';
import { sendInvalidRequest, sendSessionError } from './errors';

export interface SessionRouterDeps {
  store: MetadataStore;
  upload: RequestHandler;
  uploadDir: string;
}

interface SessionCredentials {
  documentId: string;
  encodedKey: string;
}

/** Both fields must be non-empty strings. */
function readCredentials(body: unknown): SessionCredentials | null {
  if (!body || typeof body !== 'object') return null;
  const documentId = 'documentId' in body ? body.documentId : undefined;
  const encodedKey = 'decryptionKey' in body ? body.decryptionKey : undefined;
  if (typeof documentId !== 'string' || documentId.trim() === '') return null;
  if (typeof encodedKey !== 'string' || encodedKey.trim() === '') return null;
  return { documentId: documentId.trim(), encodedKey };
}

export function restoredName(uploadedName: string): string {
  return `restored_${uploadedName.replace(/^redacted_/, '')}`;
}

export function createSessionRouter(deps: SessionRouterDeps): Router {
  const router = Router();

  // ── POST /decrypt ────────────────────────────────────────────────────

  router.post('/decrypt', async (req: Request, res: Response) => {
    try {
      const credentials = readCredentials(req.body);
      if (!credentials) {
        sendInvalidRequest(res, 'documentId and decryptionKey are required');
        return;
      }

      const result = await decryptSession({ store: deps.store }, credentials);
      if (!result.ok) {
        sendSessionError(res, result.error);
        return;
      }

      res.json(result.value);
    } catch (err: unknown) {
      console.error('[Decrypt] error:', err instanceof Error ? err.message : err);
      res.status(500).json({ error: 'Internal server error', code: 'InternalError' });
    }
  });

  // ── POST /restore ────────────────────────────────────────────────────

  router.post('/restore', deps.upload, requestSanitization(), async (req: Request, res: Response) => {
    const scope = new TempFileScope(deps.uploadDir);
    res.once('close', () => scope.release());

    try {
      if (!req.file) {
        sendInvalidRequest(res, 'File is required');
        return;
      }
      scope.track(req.file.path);

      const credentials = readCredentials(req.body);
      if (!credentials) {
        sendInvalidRequest(res, 'documentId and decryptionKey are required');
        return;
      }

      const downloadName = restoredName(req.file.originalname);
      const result = await restoreDocument({ store: deps.store }, {
        ...credentials,
        artifactPath: req.file.path,
        outputPath: scope.allocate(downloadName),
      });
      if (!result.ok) {
        sendSessionError(res, result.error);
        return;
      }

      res.type(req.file.mimetype || 'application/octet-stream');
      res.download(result.value.outputPath, downloadName, (err) => {
        if (err) {
          console.error(`[Restore] ${req.requestId ?? '-'} delivery failed: ${err.message}`);
        }
      });
    } catch (err: unknown) {
      console.error('[Restore] error:', err instanceof Error ? err.message : err);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error', code: 'InternalError' });
      }
    }
  });

  return router;
}
