// =============================================================================
// SHROUD — Redaction Session Types
//
// A session spans one redaction call and the decrypt/restore calls that
// follow it. Its only persisted state is the encrypted-pages entry in the
// metadata store; the key lives with the caller.
// =============================================================================

// ── Geometry & Items ───────────────────────────────────────────────────

/**
 * Character-grid rectangle on a page: [x0, y0, x1, y1].
 * x is the column (0-based, end exclusive), y the line (0-based, end exclusive).
 * Not sensitive — stored unencrypted.
 */
export type BoundingBox = [number, number, number, number];

/** A sensitive item as the engine extracted it (or as decryption restores it). */
export interface PiiItem {
  text: string;
  bbox: BoundingBox;
}

/** Page identifier → ordered items on that page. */
export type PiiPages = Record<string, PiiItem[]>;

// ── Persisted Entry (wire format) ──────────────────────────────────────

/**
 * One stored item. Field names match the store entry format:
 *   {"pages": {page_id: [{"encrypted_text": blob, "bbox": [x0,y0,x1,y1]}]}}
 */
export interface StoredPiiItem {
  encrypted_text: string;
  bbox: BoundingBox;
}

export interface EncryptedPages {
  pages: Record<string, StoredPiiItem[]>;
}

// ── Error Taxonomy ─────────────────────────────────────────────────────

export type SessionErrorKind =
  | 'EngineFailure'      // backend could not process the document
  | 'StoreUnavailable'   // metadata store I/O failed
  | 'SessionNotFound'    // absent or expired — deliberately indistinguishable
  | 'InvalidKeyFormat'   // key is not 43 base64url chars / 32 bytes
  | 'DecryptionFailed'   // wrong key or corrupted ciphertext
  | 'RestorationFailed'; // artifact geometry does not fit the stored boxes

export interface SessionError {
  kind: SessionErrorKind;
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: SessionError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: SessionErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

// ── Session Results ────────────────────────────────────────────────────

/**
 * What a successful redaction hands back to the caller.
 * `encodedKey` is null when nothing was extracted: no entry was stored,
 * so no key is issued for it.
 */
export interface IssuedSession {
  documentId: string;
  encodedKey: string | null;
  artifactPath: string;
  itemCount: number;
}

export interface DecryptedSession {
  documentId: string;
  pages: PiiPages;
}

export interface RestoredDocument {
  documentId: string;
  outputPath: string;
  itemCount: number;
}
