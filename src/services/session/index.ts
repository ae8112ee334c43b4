// =============================================================================
// SHROUD — Redaction Session Services
// =============================================================================

export { redactDocument, SessionContext, RedactionRequest } from './orchestrator';
export { decryptSession } from './decryption';
export { restoreDocument, RestorationRequest } from './restoration';
export { encryptPages, decryptPages, parseEncryptedPages, openSession } from './payload';
