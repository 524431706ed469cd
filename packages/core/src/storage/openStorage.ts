/**
 * Build the connection pool the server and CLI share.
 */

import type { DatabaseConfig } from '../config/ConfigLoader.js';
import type { Logger } from '../logging/Logger.js';
import { ConnectionPool } from './ConnectionPool.js';
import type { StorageBackend } from './StorageBackend.js';
import { PGliteBackend, PGliteDatabase } from './backends/PGliteBackend.js';

export type StoragePool = ConnectionPool<StorageBackend>;

export interface StoragePoolOptions {
  logger?: Logger;
  /** Clock for record timestamps (tests pin it) */
  now?: () => Date;
}

/**
 * Up to `poolSize` connections, all on one database. The database opens
 * with the first connection and closes when drain() destroys the last.
 */
export function createStoragePool(config: DatabaseConfig, options: StoragePoolOptions = {}): StoragePool {
  const database = new PGliteDatabase(config.path);

  return new ConnectionPool<StorageBackend>({
    max: config.poolSize,
    create: () => {
      options.logger?.debug('Opening database connection', { path: config.path });
      return PGliteBackend.connect(database, { now: options.now });
    },
    destroy: async (storage) => {
      options.logger?.debug('Closing database connection', { path: config.path });
      await storage.close();
    },
  });
}
