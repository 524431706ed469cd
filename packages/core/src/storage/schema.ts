/**
 * Table definitions for drizzle-orm. Must match schema.sql, which is what
 * actually creates the tables.
 */

import { pgTable, serial, text, index } from 'drizzle-orm/pg-core';

export const people = pgTable('people', {
  /** Insertion order; ids are random UUIDs */
  seq: serial('seq').notNull(),
  id: text('id').primaryKey(),
  firstName: text('first_name').notNull(),
  lastName: text('last_name').notNull(),
  email: text('email').notNull(),
  jobTitle: text('job_title').notNull(),
  avatar: text('avatar'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const comments = pgTable(
  'comments',
  {
    seq: serial('seq').notNull(),
    id: text('id').primaryKey(),
    comment: text('comment').notNull(),
    personId: text('person_id')
      .notNull()
      .references(() => people.id, { onDelete: 'cascade' }),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    personIdIdx: index('comments_person_id_idx').on(table.personId),
  })
);

export const tables = { people, comments };

/** Columns of a PersonRecord (everything but `seq`) */
export const personColumns = {
  id: people.id,
  firstName: people.firstName,
  lastName: people.lastName,
  email: people.email,
  jobTitle: people.jobTitle,
  avatar: people.avatar,
  createdAt: people.createdAt,
  updatedAt: people.updatedAt,
};

/** Columns of a CommentRecord (everything but `seq`) */
export const commentColumns = {
  id: comments.id,
  comment: comments.comment,
  personId: comments.personId,
  createdAt: comments.createdAt,
  updatedAt: comments.updatedAt,
};
