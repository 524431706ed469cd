/**
 * GraphQL API Server using graphql-yoga
 *
 * Serves the Person/Comment schema on a single endpoint (POST /graphql).
 * The schema is built once per server from the SDL files and the explicit
 * resolver map; every object field must have a resolver.
 */

import { createServer, type Server } from 'node:http';
import { createYoga, createSchema } from 'graphql-yoga';
import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { GraphQLSchema } from 'graphql';
import type { Logger, RuntimeMode, StoragePool } from '@roster/core';

import { resolvers } from './resolvers/index.js';
import { createContext, type GraphQLContext } from './context.js';
import { createErrorMasker } from './errors.js';
import { useScopedConnection } from './plugins/useScopedConnection.js';
import { useGraphiQLRedirect } from './plugins/useGraphiQLRedirect.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const SCHEMA_FILES = ['scalars.graphql', 'types.graphql', 'queries.graphql', 'mutations.graphql'];

// Load schema files
export function loadTypeDefs(): string {
  const schemaDir = join(__dirname, 'schema');

  return SCHEMA_FILES.map((file) => {
    try {
      return readFileSync(join(schemaDir, file), 'utf-8');
    } catch {
      // Not copied into dist; read it from src
      const srcPath = join(__dirname, '..', '..', '..', '..', 'packages', 'api', 'src', 'schema', file);
      return readFileSync(srcPath, 'utf-8');
    }
  }).join('\n');
}

/**
 * Build the executable schema. Fails if any object field lacks a resolver.
 */
export function buildSchema(): GraphQLSchema {
  return createSchema<GraphQLContext>({
    typeDefs: loadTypeDefs(),
    resolvers,
    resolverValidationOptions: {
      requireResolversForAllFields: 'error',
    },
  });
}

export interface GraphQLServerOptions {
  /** Storage connection pool shared by all requests */
  pool: StoragePool;
  logger: Logger;
  /** Default: development */
  mode?: RuntimeMode;
  /** Default: /graphql */
  graphqlEndpoint?: string;
  /** Serve GraphiQL; ignored in production. Default: true */
  graphiql?: boolean;
  /** Prebuilt schema; built from the SDL files when omitted */
  schema?: GraphQLSchema;
}

export function createGraphQLServer(options: GraphQLServerOptions) {
  const { pool, logger } = options;
  const mode = options.mode ?? 'development';
  const graphqlEndpoint = options.graphqlEndpoint ?? '/graphql';
  const graphiql = mode === 'development' && (options.graphiql ?? true);

  const yoga = createYoga({
    schema: options.schema ?? buildSchema(),
    graphqlEndpoint,
    context: (): GraphQLContext => createContext(pool, logger),
    maskedErrors: {
      maskError: createErrorMasker({ mode, logger }),
    },
    logging: {
      debug: (...args: unknown[]) => logger.debug(formatYogaLog(args)),
      info: (...args: unknown[]) => logger.info(formatYogaLog(args)),
      warn: (...args: unknown[]) => logger.warn(formatYogaLog(args)),
      error: (...args: unknown[]) => logger.error(formatYogaLog(args)),
    },
    landingPage: false,
    graphiql: graphiql
      ? {
          title: 'Roster GraphQL API',
          defaultQuery: `# Welcome to the Roster GraphQL API
#
# Add a person:
# mutation { addPerson(firstName: "Ada", lastName: "Lovelace",
#   email: "ada@example.com", jobTitle: "Analyst") { id fullName } }

query People {
  people {
    id
    fullName
    jobTitle
    comments {
      comment
    }
  }
}
`,
        }
      : false,
    plugins: [useScopedConnection(), ...(graphiql ? [useGraphiQLRedirect(graphqlEndpoint)] : [])],
  });

  return yoga;
}

function formatYogaLog(args: unknown[]): string {
  return args.map((arg) => (arg instanceof Error ? arg.message : String(arg))).join(' ');
}

export interface StartServerOptions extends GraphQLServerOptions {
  /** Default: 4000 */
  port?: number;
  /** Default: localhost */
  hostname?: string;
}

/**
 * Start a standalone GraphQL server. Resolves once it is listening.
 */
export function startServer(options: StartServerOptions): Promise<Server> {
  const { port = 4000, hostname = 'localhost', logger } = options;
  const yoga = createGraphQLServer(options);
  const server = createServer(yoga);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, hostname, () => {
      server.off('error', reject);
      logger.info(`Roster GraphQL API running at http://${hostname}:${port}${yoga.graphqlEndpoint}`);
      if (options.mode !== 'production' && options.graphiql !== false) {
        logger.info(`GraphiQL IDE available at http://${hostname}:${port}/graphiql`);
      }
      resolve(server);
    });
  });
}

/**
 * Stop accepting requests, then close every storage connection.
 */
export async function stopServer(server: Server, pool: StoragePool): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await pool.drain();
}
