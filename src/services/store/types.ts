// =============================================================================
// SHROUD — Metadata Store Interface
//
// Time-bound key-value store: document ID → serialized encrypted pages.
// Entries expire on their own; there is no delete in the normal flow.
// =============================================================================

import { StoreBackend } from '../../config';

export interface MetadataStore {
  readonly backend: StoreBackend;

  /**
   * Establish and verify connectivity. Rejects when the backing store is
   * unreachable — the server must not start serving in that case.
   */
  connect(): Promise<void>;

  /** Store `payload` under `id`, replacing any existing entry, until now + ttl. */
  put(id: string, payload: string, ttlSeconds: number): Promise<void>;

  /**
   * The stored payload, or null when absent or expired. Callers cannot
   * tell the two apart.
   */
  get(id: string): Promise<string | null>;

  /** Lightweight liveness check for the health endpoint. */
  ping(): Promise<boolean>;

  close(): Promise<void>;
}
