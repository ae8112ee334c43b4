// =============================================================================
// SHROUD — AES-256-GCM Item Encryption
//
// Every extracted item is encrypted on its own, with its own IV, so that
// recovering one item never exposes another. The session's document ID is
// bound in as additional authenticated data: a token copied into another
// session's entry fails authentication.
//
// Token layout (base64url):  iv (12) | authTag (16) | ciphertext
// =============================================================================

import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { KEY_LENGTH } from './keys';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;          // GCM recommended IV length
const AUTH_TAG_LENGTH = 16;    // 128-bit authentication tag

/**
 * Encrypt one item's text.
 *
 * @param associatedData — bound to the ciphertext; the same value must be
 *   supplied to decrypt (the document ID in practice)
 */
export function encryptText(plaintext: string, key: Buffer, associatedData: string): string {
  if (key.length !== KEY_LENGTH) {
    throw new Error('AES-256 requires a 32-byte key');
  }

  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  cipher.setAAD(Buffer.from(associatedData, 'utf-8'));

  const ciphertext = Buffer.concat([
    cipher.update(plaintext, 'utf-8'),
    cipher.final(),
  ]);

  return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString('base64url');
}

/**
 * Decrypt a token produced by encryptText.
 * @throws when the token is malformed, the key is wrong, or anything
 *   (ciphertext, tag, associated data) has been altered
 */
export function decryptText(token: string, key: Buffer, associatedData: string): string {
  if (key.length !== KEY_LENGTH) {
    throw new Error('AES-256 requires a 32-byte key');
  }

  const raw = Buffer.from(token, 'base64url');
  if (raw.length < IV_LENGTH + AUTH_TAG_LENGTH) {
    throw new Error('Encrypted token is truncated');
  }

  const iv = raw.subarray(0, IV_LENGTH);
  const authTag = raw.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
  const ciphertext = raw.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);
  decipher.setAAD(Buffer.from(associatedData, 'utf-8'));

  try {
    return Buffer.concat([
      decipher.update(ciphertext),
      decipher.final(),
    ]).toString('utf-8');
  } catch {
    throw new Error('GCM authentication failure: wrong key or tampered ciphertext');
  }
}
