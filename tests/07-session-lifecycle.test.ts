// =============================================================================
// SHROUD — Test Suite 07: Redaction Session Lifecycle
//
// Service-level: redact → decrypt → restore without the HTTP layer.
// Verifies:
//   - items are only recoverable with the issued key, until the TTL
//   - a redaction with nothing to hide stores nothing and issues no key
//   - lookup, key format and decryption failures are told apart
//   - concurrent sessions never share IDs, keys or entries
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import { encodeKey, generateKey } from '../src/services/crypto';
import { ClassicEngine, EngineGateway } from '../src/services/engines';
import {
  SessionContext,
  decryptSession,
  encryptPages,
  parseEncryptedPages,
  redactDocument,
  restoreDocument,
} from '../src/services/session';
import * as payload from '../src/services/session/payload';
import { MemoryMetadataStore, MetadataStore } from '../src/services/store';
import { IssuedSession } from '../src/types/session';
import { makeTempDir, SAMPLE_DOCUMENT, SAMPLE_ITEMS_SEVERITY_3, stubEngine } from './helpers';

class BrokenStore extends MemoryMetadataStore {
  async put(): Promise<void> {
    throw new Error('READONLY You can\'t write against a read only replica.');
  }

  async get(): Promise<string | null> {
    throw new Error('Connection is closed.');
  }
}

describe('Redaction session lifecycle', () => {
  let dir: string;
  let clock: number;
  let store: MemoryMetadataStore;
  let ctx: SessionContext;

  beforeEach(() => {
    dir = makeTempDir();
    clock = 1_700_000_000_000;
    store = new MemoryMetadataStore(() => clock);
    ctx = {
      store,
      gateway: new EngineGateway({
        vision: stubEngine('vision', async () => { throw new Error('not used'); }),
        classic: new ClassicEngine(),
      }, 5000),
      ttlSeconds: 60,
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function redactText(text: string, severity = 3): Promise<IssuedSession> {
    const filePath = path.join(dir, `input-${Math.random().toString(36).slice(2)}.txt`);
    fs.writeFileSync(filePath, text);
    const result = await redactDocument(ctx, { variant: 'classic', filePath, severity, outputPath: `${filePath}.out` });
    if (!result.ok) throw new Error(`redaction failed: ${result.error.message}`);
    return result.value;
  }

  function requireKey(session: IssuedSession): string {
    if (!session.encodedKey) throw new Error('expected a key to be issued');
    return session.encodedKey;
  }

  test('redact then decrypt returns the extracted items', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);
    expect(session.itemCount).toBe(4);

    const decrypted = await decryptSession(ctx, { documentId: session.documentId, encodedKey: requireKey(session) });
    expect(decrypted).toEqual({
      ok: true,
      value: { documentId: session.documentId, pages: SAMPLE_ITEMS_SEVERITY_3 },
    });
  });

  test('the stored entry holds ciphertext and boxes only', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);
    const raw = await store.get(session.documentId);
    if (raw === null) throw new Error('entry missing');

    expect(raw).not.toContain('Jane Smith');
    expect(raw).not.toContain('123-45-6789');

    const entry = parseEncryptedPages(raw);
    expect(entry?.pages['1'].map(item => item.bbox)).toEqual([
      [12, 0, 22, 1],
      [26, 0, 48, 1],
      [52, 0, 64, 1],
      [5, 1, 16, 2],
    ]);
  });

  test('restore rebuilds the original document from the artifact', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);
    const outputPath = path.join(dir, 'restored.txt');

    const restored = await restoreDocument(ctx, {
      documentId: session.documentId,
      encodedKey: requireKey(session),
      artifactPath: session.artifactPath,
      outputPath,
    });

    expect(restored).toEqual({ ok: true, value: { documentId: session.documentId, outputPath, itemCount: 4 } });
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe(SAMPLE_DOCUMENT);
  });

  test('nothing to redact: an ID is issued but no key and no entry', async () => {
    const session = await redactText('Nothing sensitive here.');

    expect(session.encodedKey).toBeNull();
    expect(session.itemCount).toBe(0);
    expect(store.size()).toBe(0);

    const decrypted = await decryptSession(ctx, { documentId: session.documentId, encodedKey: encodeKey(generateKey()) });
    expect(decrypted.ok).toBe(false);
    if (!decrypted.ok) expect(decrypted.error.kind).toBe('SessionNotFound');
  });

  test('a different valid key fails with DecryptionFailed', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);

    const decrypted = await decryptSession(ctx, { documentId: session.documentId, encodedKey: encodeKey(generateKey()) });
    expect(decrypted).toEqual({
      ok: false,
      error: { kind: 'DecryptionFailed', message: 'Decryption failed. The provided key is incorrect.' },
    });
  });

  test('a malformed key fails with InvalidKeyFormat', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);

    const decrypted = await decryptSession(ctx, { documentId: session.documentId, encodedKey: 'not-a-key' });
    expect(decrypted.ok).toBe(false);
    if (!decrypted.ok) expect(decrypted.error.kind).toBe('InvalidKeyFormat');
  });

  test('an unknown ID is reported before the key is examined', async () => {
    const decrypted = await decryptSession(ctx, { documentId: 'no-such-document', encodedKey: 'not-a-key' });
    expect(decrypted).toEqual({
      ok: false,
      error: { kind: 'SessionNotFound', message: 'Document ID not found or has expired.' },
    });
  });

  test('sessions expire after the TTL', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);
    const encodedKey = requireKey(session);

    clock += 59_000;
    expect((await decryptSession(ctx, { documentId: session.documentId, encodedKey })).ok).toBe(true);

    clock += 1_000;
    const expired = await decryptSession(ctx, { documentId: session.documentId, encodedKey });
    expect(expired.ok).toBe(false);
    if (!expired.ok) expect(expired.error.kind).toBe('SessionNotFound');
  });

  test('restore is refused once the session has expired', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);
    const outputPath = path.join(dir, 'restored.txt');

    clock += 60_000;
    const restored = await restoreDocument(ctx, {
      documentId: session.documentId,
      encodedKey: requireKey(session),
      artifactPath: session.artifactPath,
      outputPath,
    });

    expect(restored).toEqual({
      ok: false,
      error: { kind: 'SessionNotFound', message: 'Document ID not found or has expired.' },
    });
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  test('items moved into another session fail authentication', async () => {
    const first = await redactText(SAMPLE_DOCUMENT);
    const second = await redactText(SAMPLE_DOCUMENT);

    // First session's entry copied under the second ID; its tokens stay bound to the first
    const raw = await store.get(first.documentId);
    if (raw === null) throw new Error('entry missing');
    await store.put(second.documentId, raw, 60);

    const decrypted = await decryptSession(ctx, { documentId: second.documentId, encodedKey: requireKey(first) });
    expect(decrypted.ok).toBe(false);
    if (!decrypted.ok) expect(decrypted.error.kind).toBe('DecryptionFailed');
  });

  test('a corrupted entry fails with DecryptionFailed', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);
    await store.put(session.documentId, '{"pages": "garbage"}', 60);

    const decrypted = await decryptSession(ctx, { documentId: session.documentId, encodedKey: requireKey(session) });
    expect(decrypted).toEqual({
      ok: false,
      error: { kind: 'DecryptionFailed', message: 'Decryption failed. The stored entry is corrupted.' },
    });
  });

  test('restore against an artifact that does not fit fails with RestorationFailed', async () => {
    const session = await redactText(SAMPLE_DOCUMENT);
    const unrelated = path.join(dir, 'unrelated.txt');
    fs.writeFileSync(unrelated, 'tiny');

    const restored = await restoreDocument(ctx, {
      documentId: session.documentId,
      encodedKey: requireKey(session),
      artifactPath: unrelated,
      outputPath: path.join(dir, 'restored.txt'),
    });

    expect(restored).toEqual({
      ok: false,
      error: {
        kind: 'RestorationFailed',
        message: 'An error occurred during un-redaction: Bounding box [52, 0, 64, 1] falls outside page 1',
      },
    });
  });

  test('concurrent redactions get distinct IDs and keys', async () => {
    const sessions = await Promise.all(
      Array.from({ length: 8 }, (_, i) => redactText(`Employee ${i}: SSN 100-00-000${i}`, 1))
    );

    expect(new Set(sessions.map(s => s.documentId)).size).toBe(8);
    expect(new Set(sessions.map(s => s.encodedKey)).size).toBe(8);
    expect(store.size()).toBe(8);

    for (const [i, session] of sessions.entries()) {
      const decrypted = await decryptSession(ctx, { documentId: session.documentId, encodedKey: requireKey(session) });
      expect(decrypted.ok).toBe(true);
      if (decrypted.ok) expect(decrypted.value.pages['1'][0].text).toBe(`100-00-000${i}`);
    }
  });

  test('an encryption failure propagates instead of reading as a store outage', async () => {
    const filePath = path.join(dir, 'input.txt');
    fs.writeFileSync(filePath, SAMPLE_DOCUMENT);
    const spy = jest.spyOn(payload, 'encryptPages').mockImplementation(() => {
      throw new Error('cipher unavailable');
    });

    try {
      await expect(redactDocument(ctx, { variant: 'classic', filePath, severity: 3, outputPath: `${filePath}.out` }))
        .rejects.toThrow('cipher unavailable');
      expect(store.heldCount()).toBe(0);
    } finally {
      spy.mockRestore();
    }
  });

  test('an engine failure issues nothing', async () => {
    const filePath = path.join(dir, 'binary.bin');
    fs.writeFileSync(filePath, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x00]));

    const result = await redactDocument(ctx, { variant: 'classic', filePath, severity: 3, outputPath: `${filePath}.out` });
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'EngineFailure',
        message: 'The classic engine could not process the document: Unsupported document: binary content',
      },
    });
    expect(store.size()).toBe(0);
  });
});

describe('Store outages', () => {
  let dir: string;
  const store: MetadataStore = new BrokenStore();

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('a failed store write returns StoreUnavailable and no key', async () => {
    const filePath = path.join(dir, 'input.txt');
    fs.writeFileSync(filePath, SAMPLE_DOCUMENT);
    const ctx: SessionContext = {
      store,
      gateway: new EngineGateway({
        vision: stubEngine('vision', async () => { throw new Error('not used'); }),
        classic: new ClassicEngine(),
      }, 5000),
      ttlSeconds: 60,
    };

    const result = await redactDocument(ctx, { variant: 'classic', filePath, severity: 3, outputPath: `${filePath}.out` });
    expect(result).toEqual({
      ok: false,
      error: { kind: 'StoreUnavailable', message: 'The redaction session could not be stored. Try again later.' },
    });
  });

  test('a failed store read returns StoreUnavailable', async () => {
    const decrypted = await decryptSession({ store }, { documentId: 'doc-1', encodedKey: encodeKey(generateKey()) });
    expect(decrypted.ok).toBe(false);
    if (!decrypted.ok) expect(decrypted.error.kind).toBe('StoreUnavailable');
  });
});

describe('Encrypted payload', () => {
  test('parseEncryptedPages rejects malformed entries', () => {
    expect(parseEncryptedPages('not json')).toBeNull();
    expect(parseEncryptedPages('[]')).toBeNull();
    expect(parseEncryptedPages('{"pages": []}')).toBeNull();
    expect(parseEncryptedPages('{"pages": {"1": [{"encrypted_text": "x", "bbox": [0, 0, 1]}]}}')).toBeNull();
  });

  test('encryptPages keeps boxes and page keys', () => {
    const entry = encryptPages({ '2': [{ text: 'Bob', bbox: [0, 0, 3, 1] }] }, generateKey(), 'doc-1');
    expect(Object.keys(entry.pages)).toEqual(['2']);
    expect(entry.pages['2'][0].bbox).toEqual([0, 0, 3, 1]);
    expect(entry.pages['2'][0].encrypted_text).not.toContain('Bob');
  });
});
