// =============================================================================
// SHROUD — Integration Test Helpers
//
// Starts the app in-process on an ephemeral port against an in-memory store,
// with a real classic engine and a swappable vision engine. Nothing leaves
// the process.
// =============================================================================

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Server } from 'http';
import { createApp } from '../src/app';
import { ClassicEngine, EngineGateway } from '../src/services/engines';
import { MemoryMetadataStore, MetadataStore } from '../src/services/store';
import { EngineInput, EngineOutput, EngineVariant, RedactionEngine } from '../src/types/engine';

export interface TestServer {
  baseUrl: string;
  store: MetadataStore;
  uploadDir: string;
  close(): Promise<void>;
}

export interface TestServerOptions {
  store?: MetadataStore;
  vision?: RedactionEngine;
  engineTimeoutMs?: number;
  sessionTtlSeconds?: number;
  maxUploadBytes?: number;
  rateLimitMax?: number;
}

/** Fresh, empty temp directory. */
export function makeTempDir(prefix = 'shroud-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Engine stub backed by a plain function. */
export function stubEngine(
  variant: EngineVariant,
  redact: (input: EngineInput, signal: AbortSignal) => Promise<EngineOutput>,
): RedactionEngine {
  return { variant, redact };
}

export async function startTestServer(options: TestServerOptions = {}): Promise<TestServer> {
  const uploadDir = makeTempDir();
  const store = options.store ?? new MemoryMetadataStore();

  const gateway = new EngineGateway(
    {
      vision: options.vision ?? stubEngine('vision', async () => {
        throw new Error('vision engine not configured in this test');
      }),
      classic: new ClassicEngine(),
    },
    options.engineTimeoutMs ?? 5000,
  );

  const app = createApp({
    store,
    gateway,
    sessionTtlSeconds: options.sessionTtlSeconds ?? 3600,
    uploadDir,
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
    rateLimit: { windowMs: 60_000, max: options.rateLimitMax ?? 1000 },
  });

  const server: Server = await new Promise(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server did not bind a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    store,
    uploadDir,
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>(resolve => server.close(() => resolve()));
      fs.rmSync(uploadDir, { recursive: true, force: true });
    },
  };
}

/**
 * Make an API request to the test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  urlPath: string,
  body?: FormData | object,
): Promise<Response> {
  const opts: RequestInit = { method };

  if (body instanceof FormData) {
    opts.body = body;
  } else if (body) {
    opts.headers = { 'Content-Type': 'application/json' };
    opts.body = JSON.stringify(body);
  }

  return fetch(`${server.baseUrl}${urlPath}`, opts);
}

/**
 * Parse JSON response with error context.
 */
export async function json<T = Record<string, unknown>>(res: Response): Promise<T> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

/** Multipart body with one file part plus string fields. */
export function uploadForm(
  file: { name: string; content: string | Buffer; type?: string },
  fields: Record<string, string> = {},
): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  const part = typeof file.content === 'string' ? file.content : new Uint8Array(file.content);
  form.append('file', new Blob([part], { type: file.type ?? 'text/plain' }), file.name);
  return form;
}

/** Poll until `condition` holds or `timeoutMs` elapses. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
}

export function filesIn(dir: string): string[] {
  return fs.existsSync(dir) ? fs.readdirSync(dir) : [];
}

// ── Shared fixture ─────────────────────────────────────────────────────

export const SAMPLE_DOCUMENT =
  'Contact Dr. Jane Smith at jane.smith@example.com or 555-123-4567.\n' +
  'SSN: 123-45-6789';

/** What the classic engine extracts from SAMPLE_DOCUMENT at severity 3. */
export const SAMPLE_ITEMS_SEVERITY_3 = {
  '1': [
    { text: 'Jane Smith', bbox: [12, 0, 22, 1] },
    { text: 'jane.smith@example.com', bbox: [26, 0, 48, 1] },
    { text: '555-123-4567', bbox: [52, 0, 64, 1] },
    { text: '123-45-6789', bbox: [5, 1, 16, 2] },
  ],
};

export const SAMPLE_REDACTED_SEVERITY_3 =
  'Contact Dr. ' + '█'.repeat(10) + ' at ' + '█'.repeat(22) + ' or ' + '█'.repeat(12) + '.\n' +
  'SSN: ' + '█'.repeat(11);
