// =============================================================================
// SHROUD — Session Error Responses
//
// Every session failure maps to one status and a stable `code`:
//   not found → 404, bad key → 400, wrong key → 403, processing → 500
// =============================================================================

import { Response } from 'express';
import { SessionError, SessionErrorKind } from '../types/session';

const STATUS_BY_KIND: Record<SessionErrorKind, number> = {
  SessionNotFound: 404,
  InvalidKeyFormat: 400,
  DecryptionFailed: 403,
  EngineFailure: 500,
  StoreUnavailable: 500,
  RestorationFailed: 500,
};

export function sendSessionError(res: Response, error: SessionError): void {
  res.status(STATUS_BY_KIND[error.kind]).json({ error: error.message, code: error.kind });
}

export function sendInvalidRequest(res: Response, message: string): void {
  res.status(400).json({ error: message, code: 'InvalidRequest' });
}
