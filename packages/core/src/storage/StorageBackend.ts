/**
 * StorageBackend - abstract base class for Person/Comment storage
 *
 * All operations are async so callers do not depend on whether the driver
 * underneath blocks. Every write is a single transaction: either the whole
 * record (or seed batch) is stored or nothing is.
 *
 * Implementations:
 * - PGliteBackend (drizzle-orm over PGlite)
 */

import type {
  PersonRecord,
  CommentRecord,
  NewPersonInput,
  SeedPerson,
} from '@roster/types';

export interface StorageStats {
  personCount: number;
  commentCount: number;
}

export interface SeedResult {
  person: PersonRecord;
  comments: CommentRecord[];
}

export abstract class StorageBackend {
  /**
   * Release the underlying connection.
   */
  abstract close(): Promise<void>;

  // ========================================
  // People
  // ========================================

  /**
   * Insert a person with a freshly generated id.
   * @throws ValidationError on an empty required field, malformed email or avatar
   */
  abstract createPerson(fields: NewPersonInput): Promise<PersonRecord>;

  /**
   * @throws NotFoundError
   */
  abstract findPerson(id: string): Promise<PersonRecord>;

  /**
   * Batch lookup. The result is aligned with `ids`; unknown ids give null.
   */
  abstract findPeople(ids: readonly string[]): Promise<Array<PersonRecord | null>>;

  /**
   * All people, in insertion order.
   */
  abstract listPeople(): Promise<PersonRecord[]>;

  /**
   * Delete a person and, through the foreign key, all of their comments.
   * @throws NotFoundError
   */
  abstract deletePerson(id: string): Promise<void>;

  // ========================================
  // Comments
  // ========================================

  /**
   * Insert a comment owned by `personId`.
   * @throws NotFoundError when `personId` names no person (nothing is written)
   * @throws ValidationError when `body` is empty
   */
  abstract createComment(personId: string, body: string): Promise<CommentRecord>;

  /**
   * @throws NotFoundError
   */
  abstract findComment(id: string): Promise<CommentRecord>;

  /**
   * All comments, in insertion order.
   */
  abstract listComments(): Promise<CommentRecord[]>;

  /**
   * A person's comments, in insertion order. Empty for unknown ids.
   */
  abstract commentsForPerson(personId: string): Promise<CommentRecord[]>;

  /**
   * Batch form of commentsForPerson(), aligned with `personIds`.
   */
  abstract commentsForPeople(personIds: readonly string[]): Promise<CommentRecord[][]>;

  // ========================================
  // Maintenance
  // ========================================

  /**
   * Insert a person and their comments in one transaction.
   */
  abstract seed(data: SeedPerson): Promise<SeedResult>;

  abstract getStats(): Promise<StorageStats>;
}
