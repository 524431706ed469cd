/**
 * Serve command - run the GraphQL API until SIGINT/SIGTERM
 */

import type { Server } from 'http';
import { Command } from 'commander';
import { closeLogger, createStoragePool } from '@roster/core';
import { startServer, stopServer } from '@roster/api';
import { loadProject, type ProjectOptions } from './shared.js';
import { exitWithFailure } from '../utils/errorFormatter.js';

interface ServeOptions extends ProjectOptions {
  port?: string;
  hostname?: string;
}

export const serveCommand = new Command('serve')
  .description('Start the GraphQL API server')
  .option('-p, --project <path>', 'Project path', '.')
  .option('--port <port>', 'Port to listen on (overrides config)')
  .option('--hostname <hostname>', 'Hostname to bind to (overrides config)')
  .action(async (options: ServeOptions) => {
    const { config, logger } = loadProject(options);
    const port = options.port !== undefined ? Number(options.port) : config.server.port;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      exitWithFailure(new Error(`Invalid port: ${options.port}`));
    }

    const pool = createStoragePool(config.database, { logger });
    let server: Server;
    try {
      server = await startServer({
        pool,
        logger,
        mode: config.mode,
        graphqlEndpoint: config.server.graphqlEndpoint,
        graphiql: config.server.graphiql,
        port,
        hostname: options.hostname ?? config.server.hostname,
      });
    } catch (err) {
      await pool.drain();
      await closeLogger(logger);
      exitWithFailure(err, ['Is another process using this port? Try: roster serve --port 4001']);
    }

    const running = server;
    let stopping = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (stopping) return;
      stopping = true;
      logger.info(`Received ${signal}, shutting down`);
      try {
        await stopServer(running, pool);
      } finally {
        await closeLogger(logger);
      }
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((err: unknown) => exitWithFailure(err));
      });
    }
  });
