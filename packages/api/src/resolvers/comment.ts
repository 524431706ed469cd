/**
 * Comment Type Resolvers
 */

import type { PersonRecord, CommentRecord } from '@roster/types';
import { NotFoundError } from '@roster/core';
import type { GraphQLContext } from '../context.js';

export const commentResolvers = {
  id: (parent: CommentRecord): string => parent.id,
  comment: (parent: CommentRecord): string => parent.comment,
  createdAt: (parent: CommentRecord): string => parent.createdAt,
  updatedAt: (parent: CommentRecord): string => parent.updatedAt,

  /**
   * Resolve the owning person through the request's person loader.
   */
  async person(parent: CommentRecord, _args: unknown, context: GraphQLContext): Promise<PersonRecord> {
    const person = await context.loaders.person.load(parent.personId);
    if (!person) {
      throw new NotFoundError('Person', parent.personId, { operation: 'Comment.person' });
    }
    return person;
  },
};
