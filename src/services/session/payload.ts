// =============================================================================
// SHROUD — Encrypted Pages Payload
//
// Conversion between extracted items and the stored entry:
//   {"pages": {page_id: [{"encrypted_text": token, "bbox": [x0,y0,x1,y1]}]}}
// Text is encrypted per item; boxes are stored in the clear.
// =============================================================================

import { decodeKey, decryptText, encryptText } from '../crypto';
import { MetadataStore } from '../store';
import {
  BoundingBox,
  EncryptedPages,
  PiiPages,
  Result,
  StoredPiiItem,
  ok,
  fail,
} from '../../types/session';

export function encryptPages(items: PiiPages, key: Buffer, documentId: string): EncryptedPages {
  const pages: Record<string, StoredPiiItem[]> = {};
  for (const [pageId, pageItems] of Object.entries(items)) {
    pages[pageId] = pageItems.map(item => ({
      encrypted_text: encryptText(item.text, key, documentId),
      bbox: item.bbox,
    }));
  }
  return { pages };
}

/**
 * Decrypt every stored item with `key`. A single failing item fails the
 * whole call; no partially decrypted result is ever returned.
 */
export function decryptPages(entry: EncryptedPages, key: Buffer, documentId: string): Result<PiiPages> {
  const pages: PiiPages = {};
  try {
    for (const [pageId, storedItems] of Object.entries(entry.pages)) {
      pages[pageId] = storedItems.map(item => ({
        text: decryptText(item.encrypted_text, key, documentId),
        bbox: item.bbox,
      }));
    }
  } catch {
    return fail('DecryptionFailed', 'Decryption failed. The provided key is incorrect.');
  }
  return ok(pages);
}

function isBoundingBox(value: unknown): value is BoundingBox {
  return Array.isArray(value) && value.length === 4 && value.every(n => typeof n === 'number');
}

function isStoredItem(value: unknown): value is StoredPiiItem {
  return typeof value === 'object' && value !== null &&
    'encrypted_text' in value && typeof value.encrypted_text === 'string' &&
    'bbox' in value && isBoundingBox(value.bbox);
}

/** Parse a stored JSON blob; null when it is not a well-formed entry. */
export function parseEncryptedPages(json: string): EncryptedPages | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('pages' in parsed)) return null;
  const { pages } = parsed;
  if (typeof pages !== 'object' || pages === null || Array.isArray(pages)) return null;

  const result: Record<string, StoredPiiItem[]> = {};
  for (const [pageId, items] of Object.entries(pages)) {
    if (!Array.isArray(items) || !items.every(isStoredItem)) return null;
    result[pageId] = items;
  }
  return { pages: result };
}

/**
 * The shared front half of decrypt and restore:
 *   entry lookup → SessionNotFound / StoreUnavailable
 *   key decoding → InvalidKeyFormat
 *   decryption   → DecryptionFailed
 * Checked in that order.
 */
export async function openSession(
  store: MetadataStore,
  documentId: string,
  encodedKey: string
): Promise<Result<PiiPages>> {
  let json: string | null;
  try {
    json = await store.get(documentId);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Store] Read failed for ${documentId}: ${message}`);
    return fail('StoreUnavailable', 'The metadata store is unavailable. Try again later.');
  }

  if (json === null) {
    return fail('SessionNotFound', 'Document ID not found or has expired.');
  }

  const key = decodeKey(encodedKey);
  if (!key.ok) return key;

  const entry = parseEncryptedPages(json);
  if (!entry) {
    console.error(`[Store] Entry for ${documentId} is not a readable encrypted-pages payload`);
    return fail('DecryptionFailed', 'Decryption failed. The stored entry is corrupted.');
  }

  return decryptPages(entry, key.value, documentId);
}

export function countItems(pages: PiiPages): number {
  return Object.values(pages).reduce((sum, items) => sum + items.length, 0);
}
