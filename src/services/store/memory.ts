// =============================================================================
// SHROUD — In-Memory Metadata Store
//
// Development and test backend. Entries are lost on restart.
// Expired entries are dropped on read and by a purge timer started in
// connect(), so ciphertext is not held past its TTL.
// =============================================================================

import { MetadataStore } from './types';

interface MemoryEntry {
  payload: string;
  expiresAt: number;
}

const DEFAULT_PURGE_INTERVAL_MS = 60 * 1000;

export class MemoryMetadataStore implements MetadataStore {
  readonly backend = 'memory' as const;
  private entries = new Map<string, MemoryEntry>();
  private purgeTimer: NodeJS.Timeout | null = null;

  /** @param now — clock in epoch milliseconds; injectable for expiry tests */
  constructor(
    private readonly now: () => number = Date.now,
    private readonly purgeIntervalMs: number = DEFAULT_PURGE_INTERVAL_MS,
  ) {}

  async connect(): Promise<void> {
    console.warn('[Store] Using in-memory metadata store — sessions do not survive a restart');

    if (!this.purgeTimer) {
      this.purgeTimer = setInterval(() => this.purgeExpired(), this.purgeIntervalMs);
      this.purgeTimer.unref();
    }
  }

  async put(id: string, payload: string, ttlSeconds: number): Promise<void> {
    this.entries.set(id, {
      payload,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async get(id: string): Promise<string | null> {
    const entry = this.entries.get(id);
    if (!entry) return null;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(id);
      return null;
    }
    return entry.payload;
  }

  /** Delete expired entries. Returns how many were removed. */
  purgeExpired(): number {
    const now = this.now();
    let purged = 0;
    for (const [id, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(id);
        purged++;
      }
    }
    if (purged > 0) {
      console.log(`[Store] Purged ${purged} expired session(s)`);
    }
    return purged;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = null;
    }
    this.entries.clear();
  }

  /** Number of live (unexpired) entries. */
  size(): number {
    const now = this.now();
    let count = 0;
    for (const entry of this.entries.values()) {
      if (now < entry.expiresAt) count++;
    }
    return count;
  }

  /** Number of entries held, expired or not. */
  heldCount(): number {
    return this.entries.size;
  }
}
