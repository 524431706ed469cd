/**
 * Mutation Resolvers
 *
 * Each mutation is one storage transaction.
 */

import type { PersonRecord, CommentRecord } from '@roster/types';
import { storageOf, type GraphQLContext } from '../context.js';

export interface AddPersonArgs {
  firstName: string;
  lastName: string;
  email: string;
  jobTitle: string;
  avatar?: string | null;
}

export interface AddCommentArgs {
  comment: string;
  personId: string;
}

export const mutationResolvers = {
  /**
   * Add a comment to an existing person.
   */
  async addComment(_: unknown, args: AddCommentArgs, context: GraphQLContext): Promise<CommentRecord> {
    const storage = await storageOf(context);
    const comment = await storage.createComment(args.personId, args.comment);
    context.logger.debug('Comment added', { requestId: context.requestId, id: comment.id, personId: comment.personId });
    return comment;
  },

  /**
   * Add a person with a freshly generated id.
   */
  async addPerson(_: unknown, args: AddPersonArgs, context: GraphQLContext): Promise<PersonRecord> {
    const storage = await storageOf(context);
    const person = await storage.createPerson({
      firstName: args.firstName,
      lastName: args.lastName,
      email: args.email,
      jobTitle: args.jobTitle,
      avatar: args.avatar ?? null,
    });
    context.logger.debug('Person added', { requestId: context.requestId, id: person.id });
    context.loaders.person.prime(person.id, person);
    return person;
  },
};
