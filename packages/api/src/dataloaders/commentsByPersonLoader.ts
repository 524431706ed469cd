/**
 * Comments-by-person DataLoader
 *
 * Batches Person.comments for every person in a response into one
 * commentsForPeople() call.
 */

import DataLoader from 'dataloader';
import type { CommentRecord } from '@roster/types';
import type { ConnectionLease, StorageBackend } from '@roster/core';

export function createCommentsByPersonLoader(
  connection: ConnectionLease<StorageBackend>
): DataLoader<string, CommentRecord[]> {
  return new DataLoader<string, CommentRecord[]>(
    async (personIds: readonly string[]) => {
      const storage = await connection.get();
      return storage.commentsForPeople(personIds);
    },
    { cache: true, maxBatchSize: 100 }
  );
}
