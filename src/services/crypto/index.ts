// =============================================================================
// SHROUD — Crypto Services
// =============================================================================

export { generateKey, encodeKey, decodeKey, KEY_LENGTH } from './keys';
export { encryptText, decryptText } from './encryption';
