/**
 * @roster/api - GraphQL API over people and their comments
 */

export { createGraphQLServer, startServer, stopServer, buildSchema, loadTypeDefs } from './server.js';
export type { GraphQLServerOptions, StartServerOptions } from './server.js';
export type { GraphQLContext } from './context.js';
export { createErrorMasker, graphQLErrorCode, INTERNAL_ERROR_CODE } from './errors.js';
export { GRAPHIQL_PATH } from './plugins/useGraphiQLRedirect.js';
