/**
 * Record types - rows of the `people` and `comments` tables as the
 * storage layer returns them.
 *
 * Timestamps are ISO-8601 strings (UTC, millisecond precision).
 */

/**
 * A person who can own comments.
 */
export interface PersonRecord {
  /** UUID, generated on insert */
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  jobTitle: string;
  /** Avatar image URL */
  avatar: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * A comment, always owned by exactly one person.
 */
export interface CommentRecord {
  id: string;
  /** Comment body */
  comment: string;
  /** Owning person's id */
  personId: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields accepted when creating a person.
 */
export interface NewPersonInput {
  firstName: string;
  lastName: string;
  email: string;
  jobTitle: string;
  avatar?: string | null;
}

/**
 * Fields accepted when creating a comment.
 */
export interface NewCommentInput {
  personId: string;
  comment: string;
}

/**
 * A person plus the comment bodies written under them, inserted together.
 */
export interface SeedPerson extends NewPersonInput {
  comments: string[];
}
