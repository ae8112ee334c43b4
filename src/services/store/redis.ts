// =============================================================================
// SHROUD — Redis Metadata Store
//
// Wire contract:
//   SET <document_id> <json> EX <ttl>
//   GET <document_id>            → json | nil
// Redis expires the key itself; nothing here tracks expiry.
// =============================================================================

import { MetadataStore } from './types';

// Minimal Redis client interface (compatible with ioredis)
export interface RedisClient {
  connect(): Promise<void>;
  ping(): Promise<string>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
  get(key: string): Promise<string | null>;
  quit(): Promise<unknown>;
  disconnect(): void;
}

export class RedisMetadataStore implements MetadataStore {
  readonly backend = 'redis' as const;

  /** @param keyPrefix — prepended to every document ID ('' stores the bare ID) */
  constructor(
    private readonly client: RedisClient,
    private readonly keyPrefix: string = '',
  ) {}

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      await this.client.ping();
    } catch (err: unknown) {
      // Stop ioredis from retrying in the background — startup has failed
      this.client.disconnect();
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Could not connect to Redis: ${message}`);
    }
    console.log('[Store] Successfully connected to Redis.');
  }

  async put(id: string, payload: string, ttlSeconds: number): Promise<void> {
    await this.client.set(this.keyPrefix + id, payload, 'EX', ttlSeconds);
  }

  async get(id: string): Promise<string | null> {
    return this.client.get(this.keyPrefix + id);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
