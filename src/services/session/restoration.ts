// =============================================================================
// SHROUD — Restoration Service
//
// Rebuilds the original document from a redacted artifact by writing each
// decrypted item back into its recorded box.
//
// The artifact is assumed to be the one produced for this document ID; its
// identity is not verified. A different file with compatible geometry
// restores to nonsense for the caller alone. Boxes that do not fit the file
// at all fail with RestorationFailed.
// =============================================================================

import { RestoredDocument, Result, ok, fail } from '../../types/session';
import { loadDocument, reinsertItems, writeDocument } from '../document';
import { MetadataStore } from '../store';
import { countItems, openSession } from './payload';

export interface RestorationRequest {
  documentId: string;
  encodedKey: string;
  /** The redacted artifact supplied by the caller */
  artifactPath: string;
  /** Where the reconstructed document is written */
  outputPath: string;
}

export async function restoreDocument(
  ctx: { store: MetadataStore },
  request: RestorationRequest
): Promise<Result<RestoredDocument>> {
  const opened = await openSession(ctx.store, request.documentId, request.encodedKey);
  if (!opened.ok) {
    console.warn(`[Restore] ${request.documentId}: ${opened.error.kind}`);
    return opened;
  }

  try {
    const redacted = await loadDocument(request.artifactPath);
    const restored = reinsertItems(redacted, opened.value);
    await writeDocument(request.outputPath, restored);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Restore] ${request.documentId}: reconstruction failed: ${message}`);
    return fail('RestorationFailed', `An error occurred during un-redaction: ${message}`);
  }

  const itemCount = countItems(opened.value);
  console.log(`[Restore] ${request.documentId}: ${itemCount} item(s) reinserted`);
  return ok({ documentId: request.documentId, outputPath: request.outputPath, itemCount });
}
