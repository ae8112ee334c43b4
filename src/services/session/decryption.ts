// =============================================================================
// SHROUD — Decryption Service
//
// Returns a session's extracted items in plaintext, without touching any
// document. Requires the key issued at redaction time.
// =============================================================================

import { DecryptedSession, Result, ok } from '../../types/session';
import { MetadataStore } from '../store';
import { countItems, openSession } from './payload';

export async function decryptSession(
  ctx: { store: MetadataStore },
  request: { documentId: string; encodedKey: string }
): Promise<Result<DecryptedSession>> {
  const opened = await openSession(ctx.store, request.documentId, request.encodedKey);
  if (!opened.ok) {
    console.warn(`[Decrypt] ${request.documentId}: ${opened.error.kind}`);
    return opened;
  }

  console.log(`[Decrypt] ${request.documentId}: ${countItems(opened.value)} item(s) decrypted`);
  return ok({ documentId: request.documentId, pages: opened.value });
}
