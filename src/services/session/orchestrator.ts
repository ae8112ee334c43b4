// =============================================================================
// SHROUD — Redaction Session Orchestrator
//
// One redaction request end to end:
//   1. Engine gateway redacts the uploaded document (timeout-bounded)
//   2. Fresh document ID
//   3. If items were extracted: fresh key, per-item encryption, store write
//      with the session TTL — completed before returning
//   4. Artifact + (document ID, encoded key) back to the caller
//
// Failure at any step returns the error alone: no document ID, no key, and
// no store entry (the write is the last fallible step).
//
// Temporary files are not handled here — the caller owns their scope.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { EngineVariant } from '../../types/engine';
import { IssuedSession, Result, ok, fail } from '../../types/session';
import { encodeKey, generateKey } from '../crypto';
import { EngineGateway } from '../engines';
import { MetadataStore } from '../store';
import { countItems, encryptPages } from './payload';

export interface SessionContext {
  store: MetadataStore;
  gateway: EngineGateway;
  ttlSeconds: number;
}

export interface RedactionRequest {
  variant: EngineVariant;
  filePath: string;
  severity: number;
  outputPath: string;
}

export async function redactDocument(
  ctx: SessionContext,
  request: RedactionRequest
): Promise<Result<IssuedSession>> {
  const engineResult = await ctx.gateway.redact(request.variant, {
    filePath: request.filePath,
    severity: request.severity,
    outputPath: request.outputPath,
  });
  if (!engineResult.ok) return engineResult;

  const { artifactPath, items } = engineResult.value;
  const documentId = uuidv4();

  if (!items) {
    console.log(`[Redact] ${request.variant}: no sensitive items found — session ${documentId} not stored`);
    return ok({ documentId, encodedKey: null, artifactPath, itemCount: 0 });
  }

  const key = generateKey();
  const itemCount = countItems(items);

  const entry = encryptPages(items, key, documentId);

  try {
    await ctx.store.put(documentId, JSON.stringify(entry), ctx.ttlSeconds);
  } catch (err: unknown) {
    key.fill(0);
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Redact] Could not store session ${documentId}: ${message}`);
    return fail('StoreUnavailable', 'The redaction session could not be stored. Try again later.');
  }

  console.log(
    `[Redact] ${request.variant}: session ${documentId} stored ` +
    `(${itemCount} item(s), expires in ${ctx.ttlSeconds}s)`
  );

  return ok({ documentId, encodedKey: encodeKey(key), artifactPath, itemCount });
}
