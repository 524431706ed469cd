/**
 * Releases the request's storage connection once execution is done, on
 * success and on error alike. Requests that never touched storage never
 * acquired one, so releasing is a no-op for them.
 */

import type { Plugin } from 'graphql-yoga';
import type { GraphQLContext } from '../context.js';

export function useScopedConnection(): Plugin<GraphQLContext> {
  return {
    onExecute({ args }) {
      const { connection } = args.contextValue;
      return {
        onExecuteDone() {
          return connection.release();
        },
      };
    },
  };
}
