// =============================================================================
// SHROUD — Express Application
//
//   /api/health            — store liveness (unauthenticated)
//   /api/redact/vision     — redact with the model-backed engine
//   /api/redact/classic    — redact with the rule-based engine
//   /api/decrypt           — decrypted items for a session
//   /api/restore           — rebuild a document from its redacted artifact
//
// The app is built from its dependencies so tests can run it against an
// in-memory store and stub engines; server.ts wires the real ones.
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { requestId, requestSanitization, errorHandler } from './middleware/security';
import { createUpload } from './middleware/upload';
import { EngineGateway } from './services/engines';
import { MetadataStore } from './services/store';
import {
  createRedactionRouter,
  DOCUMENT_ID_HEADER,
  DECRYPTION_KEY_HEADER,
  REDACTION_COUNT_HEADER,
} from './routes/redaction';
import { createSessionRouter } from './routes/sessions';

export const SERVICE_NAME = 'shroud';
export const SERVICE_VERSION = '0.1.0';

export interface AppDeps {
  store: MetadataStore;
  gateway: EngineGateway;
  sessionTtlSeconds: number;
  uploadDir: string;
  maxUploadBytes: number;
  rateLimit: { windowMs: number; max: number };
  corsOrigin?: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const startTime = Date.now();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: deps.corsOrigin ?? '*',
    // Browsers only expose these to scripts when listed
    exposedHeaders: [DOCUMENT_ID_HEADER, DECRYPTION_KEY_HEADER, REDACTION_COUNT_HEADER, 'Content-Disposition'],
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());
  app.use(requestSanitization());

  const apiLimiter = rateLimit({
    windowMs: deps.rateLimit.windowMs,
    limit: deps.rateLimit.max,
    message: { error: 'Too many requests. Try again later.', code: 'RateLimited' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  app.get('/api/health', async (_req, res) => {
    const storeStart = Date.now();
    const healthy = await deps.store.ping();
    const checks = {
      store: {
        backend: deps.store.backend,
        status: healthy ? 'healthy' : 'unhealthy',
        latencyMs: Date.now() - storeStart,
      },
    };

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  const upload = createUpload(deps.uploadDir, deps.maxUploadBytes).single('file');

  app.use('/api/redact', apiLimiter, createRedactionRouter({
    session: { store: deps.store, gateway: deps.gateway, ttlSeconds: deps.sessionTtlSeconds },
    upload,
    uploadDir: deps.uploadDir,
  }));

  app.use('/api', apiLimiter, createSessionRouter({
    store: deps.store,
    upload,
    uploadDir: deps.uploadDir,
  }));

  // ── 404 Handler ──────────────────────────────────────────────────────

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NotFound' });
  });

  app.use(errorHandler());

  return app;
}
