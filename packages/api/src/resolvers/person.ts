/**
 * Person Type Resolvers
 *
 * Every field is bound explicitly; nothing falls back to reading a
 * same-named property off the record.
 */

import type { PersonRecord, CommentRecord } from '@roster/types';
import { formatFullName } from '@roster/core';
import type { GraphQLContext } from '../context.js';

export const personResolvers = {
  id: (parent: PersonRecord): string => parent.id,
  firstName: (parent: PersonRecord): string => parent.firstName,
  lastName: (parent: PersonRecord): string => parent.lastName,
  email: (parent: PersonRecord): string => parent.email,
  jobTitle: (parent: PersonRecord): string => parent.jobTitle,
  avatar: (parent: PersonRecord): string | null => parent.avatar,
  createdAt: (parent: PersonRecord): string => parent.createdAt,
  updatedAt: (parent: PersonRecord): string => parent.updatedAt,

  fullName(parent: PersonRecord): string {
    return formatFullName(parent.firstName, parent.lastName);
  },

  /**
   * Resolve the person's comments, batched across all people in the response.
   */
  comments(parent: PersonRecord, _args: unknown, context: GraphQLContext): Promise<CommentRecord[]> {
    return context.loaders.commentsByPerson.load(parent.id);
  },
};
