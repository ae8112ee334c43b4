// =============================================================================
// SHROUD — Session Key Management
//
// One fresh AES-256 key per redaction session. Keys are handed to the
// caller in URL-safe base64 and never persisted server-side; decrypt and
// restore require the caller to present the key again.
// =============================================================================

import { randomBytes } from 'crypto';
import { Result, ok, fail } from '../../types/session';

export const KEY_LENGTH = 32;

/** 32 bytes → 43 base64url characters (no padding). A single '=' is tolerated. */
const ENCODED_KEY_PATTERN = /^[A-Za-z0-9_-]{43}=?$/;

export function generateKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}

export function encodeKey(key: Buffer): string {
  if (key.length !== KEY_LENGTH) {
    throw new Error(`Session keys must be ${KEY_LENGTH} bytes`);
  }
  return key.toString('base64url');
}

/**
 * Decode a transport-encoded key.
 * Buffer.from(..., 'base64url') silently skips characters outside the
 * alphabet and ignores trailing bits, so the shape is checked before
 * decoding and the canonical form after.
 */
export function decodeKey(encoded: string): Result<Buffer> {
  const trimmed = encoded.trim();
  if (!ENCODED_KEY_PATTERN.test(trimmed)) {
    return fail('InvalidKeyFormat', 'Invalid decryption key format.');
  }

  const unpadded = trimmed.replace(/=$/, '');
  const key = Buffer.from(unpadded, 'base64url');
  // The 43rd character carries 2 spare bits; only the encoding encodeKey emits is accepted
  if (key.length !== KEY_LENGTH || key.toString('base64url') !== unpadded) {
    return fail('InvalidKeyFormat', 'Invalid decryption key format.');
  }

  return ok(key);
}
