// =============================================================================
// SHROUD — Metadata Store Factory
//
//   redis    — default; Redis expires entries itself
//   postgres — redaction_sessions table with expires_at + purge timer
//   memory   — development only; nothing survives a restart
// =============================================================================

import Redis from 'ioredis';
import { AppConfig } from '../../config';
import { createPool } from '../../db/pool';
import { MetadataStore } from './types';
import { RedisMetadataStore } from './redis';
import { PostgresMetadataStore } from './postgres';
import { MemoryMetadataStore } from './memory';

export { MetadataStore } from './types';
export { RedisMetadataStore, RedisClient } from './redis';
export { PostgresMetadataStore, SqlClient } from './postgres';
export { MemoryMetadataStore } from './memory';

/**
 * Build the store handle for the configured backend. Nothing connects
 * until `connect()` is called.
 */
export function createMetadataStore(storeConfig: AppConfig['store']): MetadataStore {
  switch (storeConfig.backend) {
    case 'redis': {
      const client = new Redis(storeConfig.redisUrl, {
        lazyConnect: true,
        maxRetriesPerRequest: 2,
        connectTimeout: 5000,
      });
      client.on('error', (err: Error) => {
        console.error('[Store] Redis error:', err.message);
      });
      return new RedisMetadataStore(client, storeConfig.redisKeyPrefix);
    }

    case 'postgres': {
      const pool = createPool(storeConfig.databaseUrl);
      return new PostgresMetadataStore({
        query: (text, values) => pool.query(text, values),
        end: () => pool.end(),
      });
    }

    case 'memory':
      return new MemoryMetadataStore();
  }
}
