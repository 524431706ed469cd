/**
 * Person DataLoader
 *
 * Batches the Comment.person lookups of one request into a single
 * findPeople() call, so listing N comments costs one query for their
 * owners rather than N.
 */

import DataLoader from 'dataloader';
import type { PersonRecord } from '@roster/types';
import type { ConnectionLease, StorageBackend } from '@roster/core';

export function createPersonLoader(
  connection: ConnectionLease<StorageBackend>
): DataLoader<string, PersonRecord | null> {
  return new DataLoader<string, PersonRecord | null>(
    async (ids: readonly string[]) => {
      const storage = await connection.get();
      return storage.findPeople(ids);
    },
    {
      // Per-request cache; the loader is discarded with the request
      cache: true,
      maxBatchSize: 100,
    }
  );
}
