/**
 * GET /graphiql -> 302 to the GraphQL endpoint, where yoga serves GraphiQL
 * to browsers. Only installed in development mode.
 */

import type { Plugin } from 'graphql-yoga';

export const GRAPHIQL_PATH = '/graphiql';

export function useGraphiQLRedirect(graphqlEndpoint: string): Plugin {
  return {
    onRequest({ url, endResponse, fetchAPI }) {
      if (url.pathname === GRAPHIQL_PATH) {
        endResponse(
          new fetchAPI.Response(null, {
            status: 302,
            headers: { Location: graphqlEndpoint },
          })
        );
      }
    },
  };
}
