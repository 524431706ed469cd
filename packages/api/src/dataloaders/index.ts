/**
 * DataLoader Factory
 *
 * Creates all DataLoaders for a request context. Loaders are per-request
 * so nothing is cached across requests.
 */

import type { ConnectionLease, StorageBackend } from '@roster/core';
import { createPersonLoader } from './personLoader.js';
import { createCommentsByPersonLoader } from './commentsByPersonLoader.js';

export interface DataLoaders {
  /** Person by id */
  person: ReturnType<typeof createPersonLoader>;
  /** Comments by owning person id */
  commentsByPerson: ReturnType<typeof createCommentsByPersonLoader>;
}

export function createDataLoaders(connection: ConnectionLease<StorageBackend>): DataLoaders {
  return {
    person: createPersonLoader(connection),
    commentsByPerson: createCommentsByPersonLoader(connection),
  };
}
