// =============================================================================
// SHROUD — Main Server
// Reversible Document Redaction Service
//
// Startup order:
//   1. Metadata store connects — the process exits if it cannot
//   2. Engine gateway (vision + classic)
//   3. HTTP listener
// =============================================================================

import { config } from './config';
import { createApp, SERVICE_VERSION } from './app';
import { createEngineGateway } from './services/engines';
import { createMetadataStore } from './services/store';

async function main(): Promise<void> {
  const store = createMetadataStore(config.store);

  try {
    await store.connect();
  } catch (err: unknown) {
    console.error(`[Server] FATAL: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  }

  const gateway = createEngineGateway(config);

  const app = createApp({
    store,
    gateway,
    sessionTtlSeconds: config.session.ttlSeconds,
    uploadDir: config.uploads.dir,
    maxUploadBytes: config.uploads.maxFileSizeBytes,
    rateLimit: config.rateLimit,
    corsOrigin: process.env.CORS_ORIGIN,
  });

  const server = app.listen(config.port, () => {
    console.log(`
╔══════════════════════════════════════════════════════════════╗
║  SHROUD — Reversible Document Redaction                      ║
║  Version ${SERVICE_VERSION.padEnd(52)}║
║                                                              ║
║  Port:     ${String(config.port).padEnd(50)}║
║  Env:      ${config.nodeEnv.padEnd(50)}║
║  Store:    ${config.store.backend.padEnd(50)}║
║  Vision:   ${config.vision.apiUrl.padEnd(50)}║
║                                                              ║
║    /api/redact/{vision,classic}  → redact + issue key        ║
║    /api/decrypt                  → decrypted items           ║
║    /api/restore                  → rebuild original          ║
║    /api/health                   → store liveness probe      ║
╚══════════════════════════════════════════════════════════════╝
    `);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received — shutting down`);
    server.close(() => {
      store.close()
        .catch((err: unknown) => {
          console.error('[Server] Store close failed:', err instanceof Error ? err.message : err);
        })
        .finally(() => process.exit(0));
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('[Server] FATAL:', err);
  process.exit(1);
});
