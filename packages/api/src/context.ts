/**
 * GraphQL Context
 *
 * Request-scoped context: a lazily acquired storage connection, the
 * DataLoaders that read through it, and the logger.
 */

import { randomUUID } from 'crypto';
import type { Logger, StorageBackend, StoragePool, ConnectionLease } from '@roster/core';
import { createDataLoaders, type DataLoaders } from './dataloaders/index.js';

export interface GraphQLContext {
  /** Released by useScopedConnection when execution finishes */
  connection: ConnectionLease<StorageBackend>;
  /** DataLoaders for batching (per-request) */
  loaders: DataLoaders;
  logger: Logger;
  /** Correlates log lines from one request */
  requestId: string;
}

export function createContext(pool: StoragePool, logger: Logger): GraphQLContext {
  const connection = pool.lease();
  return {
    connection,
    loaders: createDataLoaders(connection),
    logger,
    requestId: randomUUID(),
  };
}

/**
 * The request's storage connection, acquired on first use.
 */
export function storageOf(context: GraphQLContext): Promise<StorageBackend> {
  return context.connection.get();
}
