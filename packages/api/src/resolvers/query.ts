/**
 * Query Resolvers
 *
 * Implements all Query type fields.
 */

import type { PersonRecord, CommentRecord } from '@roster/types';
import { storageOf, type GraphQLContext } from '../context.js';

export const queryResolvers = {
  /**
   * All comments in storage order.
   */
  async comments(_: unknown, _args: unknown, context: GraphQLContext): Promise<CommentRecord[]> {
    const storage = await storageOf(context);
    return storage.listComments();
  },

  /**
   * All people in storage order.
   */
  async people(_: unknown, _args: unknown, context: GraphQLContext): Promise<PersonRecord[]> {
    const storage = await storageOf(context);
    const people = await storage.listPeople();
    for (const person of people) {
      context.loaders.person.prime(person.id, person);
    }
    return people;
  },

  /**
   * Person by id. NotFoundError nulls only this field.
   */
  async person(_: unknown, args: { id: string }, context: GraphQLContext): Promise<PersonRecord> {
    const storage = await storageOf(context);
    const person = await storage.findPerson(args.id);
    context.loaders.person.prime(person.id, person);
    return person;
  },
};
