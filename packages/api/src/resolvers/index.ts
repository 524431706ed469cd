/**
 * GraphQL Resolver Map
 *
 * Explicit resolver bindings for every (type, field) in the schema, plus
 * the DateTime scalar.
 */

import { DateTimeResolver } from 'graphql-scalars';
import { personResolvers } from './person.js';
import { commentResolvers } from './comment.js';
import { queryResolvers } from './query.js';
import { mutationResolvers } from './mutation.js';

export const resolvers = {
  // Custom scalars
  DateTime: DateTimeResolver,

  // Type resolvers
  Person: personResolvers,
  Comment: commentResolvers,

  // Root resolvers
  Query: queryResolvers,
  Mutation: mutationResolvers,
};
