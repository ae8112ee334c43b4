// =============================================================================
// SHROUD — PostgreSQL Metadata Store
//
// Entries live in redaction_sessions with an absolute expires_at. Reads
// ignore expired rows; a purge timer deletes them so that expired PII does
// not linger on disk.
//
// Expiry instants are computed by this process's clock and compared with it
// on read, so every instance sharing the table should run on synced clocks.
// =============================================================================

import { MetadataStore } from './types';

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>>; rowCount?: number | null }>;
  end(): Promise<void>;
}

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS redaction_sessions (
    document_id  TEXT PRIMARY KEY,
    payload      TEXT NOT NULL,
    expires_at   TIMESTAMPTZ NOT NULL,
    created_at   TIMESTAMPTZ NOT NULL DEFAULT now()
  )`;

const DEFAULT_PURGE_INTERVAL_MS = 5 * 60 * 1000;

export class PostgresMetadataStore implements MetadataStore {
  readonly backend = 'postgres' as const;
  private purgeTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly db: SqlClient,
    private readonly options: { purgeIntervalMs?: number; now?: () => number } = {},
  ) {}

  private now(): Date {
    return new Date(this.options.now ? this.options.now() : Date.now());
  }

  async connect(): Promise<void> {
    try {
      await this.db.query(CREATE_TABLE_SQL);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Could not connect to PostgreSQL: ${message}`);
    }

    const interval = this.options.purgeIntervalMs ?? DEFAULT_PURGE_INTERVAL_MS;
    this.purgeTimer = setInterval(() => {
      this.purgeExpired().catch((err: unknown) => {
        console.error('[Store] Expired session purge failed:', err instanceof Error ? err.message : err);
      });
    }, interval);
    this.purgeTimer.unref();

    console.log('[Store] Successfully connected to PostgreSQL.');
  }

  async put(id: string, payload: string, ttlSeconds: number): Promise<void> {
    const expiresAt = new Date(this.now().getTime() + ttlSeconds * 1000);
    await this.db.query(
      `INSERT INTO redaction_sessions (document_id, payload, expires_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (document_id)
       DO UPDATE SET payload = EXCLUDED.payload, expires_at = EXCLUDED.expires_at`,
      [id, payload, expiresAt]
    );
  }

  async get(id: string): Promise<string | null> {
    const result = await this.db.query(
      `SELECT payload FROM redaction_sessions
       WHERE document_id = $1 AND expires_at > $2`,
      [id, this.now()]
    );

    if (result.rows.length === 0) return null;
    const payload = result.rows[0].payload;
    return typeof payload === 'string' ? payload : null;
  }

  /** Delete expired rows. Returns how many were removed. */
  async purgeExpired(): Promise<number> {
    const result = await this.db.query(
      `DELETE FROM redaction_sessions WHERE expires_at <= $1`,
      [this.now()]
    );
    const purged = result.rowCount ?? 0;
    if (purged > 0) {
      console.log(`[Store] Purged ${purged} expired session(s)`);
    }
    return purged;
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = null;
    }
    await this.db.end();
  }
}
