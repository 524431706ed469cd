import { readFileSync, existsSync } from 'fs';
import { join, isAbsolute, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError, toError } from '../errors/RosterError.js';
import { isLogLevel, type LogLevel } from '../logging/Logger.js';

/**
 * Roster configuration.
 *
 * Location: .roster/config.yaml under the project directory.
 *
 * ```yaml
 * mode: development
 * server:
 *   hostname: localhost
 *   port: 4000
 *   graphqlEndpoint: /graphql
 *   graphiql: true
 * database:
 *   path: .roster/data
 *   poolSize: 4
 * logging:
 *   level: info
 *   file: .roster/server.log
 * ```
 *
 * Environment variables override the file: ROSTER_MODE (or
 * NODE_ENV=production), PORT, ROSTER_DATABASE, ROSTER_LOG_LEVEL.
 */
export interface RosterConfig {
  /**
   * In production, unexpected errors reach clients as an opaque message
   * and GraphiQL is disabled.
   */
  mode: RuntimeMode;
  server: ServerConfig;
  database: DatabaseConfig;
  logging: LoggingConfig;
}

export type RuntimeMode = 'development' | 'production';

export interface ServerConfig {
  hostname: string;
  port: number;
  graphqlEndpoint: string;
  /** Serve GraphiQL (development mode only) */
  graphiql: boolean;
}

export interface DatabaseConfig {
  /**
   * PGlite data directory, relative to the project directory, or ":memory:".
   * loadConfig() returns it resolved to an absolute path.
   */
  path: string;
  /** Maximum open connections */
  poolSize: number;
}

export interface LoggingConfig {
  level: LogLevel;
  /** Optional log file, relative to the project directory */
  file?: string;
}

export const CONFIG_DIR = '.roster';
export const CONFIG_FILE = 'config.yaml';
export const MEMORY_DATABASE = ':memory:';

export const DEFAULT_CONFIG: RosterConfig = {
  mode: 'development',
  server: {
    hostname: 'localhost',
    port: 4000,
    graphqlEndpoint: '/graphql',
    graphiql: true,
  },
  database: {
    path: join(CONFIG_DIR, 'data'),
    poolSize: 4,
  },
  logging: {
    level: 'info',
  },
};

/**
 * Shape of config.yaml before validation: every section optional.
 */
export interface PartialRosterConfig {
  mode?: unknown;
  server?: ConfigSection;
  database?: ConfigSection;
  logging?: ConfigSection;
}

type ConfigSection = Record<string, unknown>;

type Env = Record<string, string | undefined>;

/**
 * Load configuration for a project directory.
 *
 * Priority: environment variables > .roster/config.yaml > DEFAULT_CONFIG.
 *
 * An unparseable config.yaml logs a warning and falls back to defaults.
 * A parseable file with invalid values THROWS ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console,
  env: Env = process.env
): RosterConfig {
  const configPath = join(projectPath, CONFIG_DIR, CONFIG_FILE);

  let parsed: PartialRosterConfig = {};
  if (existsSync(configPath)) {
    try {
      parsed = readConfigFile(configPath);
    } catch (err) {
      logger.warn(`Failed to parse ${CONFIG_FILE}: ${toError(err).message}`);
      logger.warn('Using default configuration');
    }
  }

  const config = mergeConfig(DEFAULT_CONFIG, applyEnvOverrides(parsed, env));
  return resolvePaths(config, projectPath);
}

function isMapping(value: unknown): value is ConfigSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): PartialRosterConfig {
  const content: unknown = parseYAML(readFileSync(configPath, 'utf-8'));
  if (content === null || content === undefined) {
    return {};
  }
  if (!isMapping(content)) {
    throw new Error('top level must be a mapping');
  }

  const section = (name: string): ConfigSection | undefined => {
    const value = content[name];
    if (value === undefined || value === null) return undefined;
    if (!isMapping(value)) {
      throw new Error(`${name} must be a mapping, got ${Array.isArray(value) ? 'array' : typeof value}`);
    }
    return value;
  };

  return {
    mode: content.mode,
    server: section('server'),
    database: section('database'),
    logging: section('logging'),
  };
}

function applyEnvOverrides(parsed: PartialRosterConfig, env: Env): PartialRosterConfig {
  const result: PartialRosterConfig = {
    ...parsed,
    server: { ...parsed.server },
    database: { ...parsed.database },
    logging: { ...parsed.logging },
  };

  if (env.ROSTER_MODE) {
    result.mode = env.ROSTER_MODE;
  } else if (env.NODE_ENV === 'production') {
    result.mode = 'production';
  }
  if (env.PORT) {
    result.server = { ...result.server, port: Number(env.PORT) };
  }
  if (env.ROSTER_DATABASE) {
    result.database = { ...result.database, path: env.ROSTER_DATABASE };
  }
  if (env.ROSTER_LOG_LEVEL) {
    result.logging = { ...result.logging, level: env.ROSTER_LOG_LEVEL };
  }
  return result;
}

/**
 * Merge a partial config over defaults, validating every provided value.
 * THROWS ConfigError on the first invalid value.
 */
export function mergeConfig(defaults: RosterConfig, partial: PartialRosterConfig): RosterConfig {
  const server = partial.server ?? {};
  const database = partial.database ?? {};
  const logging = partial.logging ?? {};

  const file = optional(logging.file, 'logging.file', nonEmptyString);
  const merged: RosterConfig = {
    mode: optional(partial.mode, 'mode', runtimeMode) ?? defaults.mode,
    server: {
      hostname: optional(server.hostname, 'server.hostname', nonEmptyString) ?? defaults.server.hostname,
      port: optional(server.port, 'server.port', port) ?? defaults.server.port,
      graphqlEndpoint: optional(server.graphqlEndpoint, 'server.graphqlEndpoint', endpoint) ?? defaults.server.graphqlEndpoint,
      graphiql: optional(server.graphiql, 'server.graphiql', boolean) ?? defaults.server.graphiql,
    },
    database: {
      path: optional(database.path, 'database.path', nonEmptyString) ?? defaults.database.path,
      poolSize: optional(database.poolSize, 'database.poolSize', positiveInteger) ?? defaults.database.poolSize,
    },
    logging: {
      level: optional(logging.level, 'logging.level', logLevel) ?? defaults.logging.level,
    },
  };

  const logFile = file ?? defaults.logging.file;
  if (logFile !== undefined) {
    merged.logging.file = logFile;
  }
  return merged;
}

function resolvePaths(config: RosterConfig, projectPath: string): RosterConfig {
  const toAbsolute = (path: string) => (isAbsolute(path) ? path : resolve(projectPath, path));
  const resolved: RosterConfig = {
    ...config,
    database: {
      ...config.database,
      path: config.database.path === MEMORY_DATABASE ? MEMORY_DATABASE : toAbsolute(config.database.path),
    },
    logging: { ...config.logging },
  };
  if (config.logging.file !== undefined) {
    resolved.logging.file = toAbsolute(config.logging.file);
  }
  return resolved;
}

// === Value validators ===

type Check<T> = (value: unknown, key: string) => T;

function optional<T>(value: unknown, key: string, check: Check<T>): T | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return check(value, key);
}

function fail(key: string, message: string): never {
  throw new ConfigError(
    `Config error: ${key} ${message}`,
    { field: key },
    { suggestion: 'Fix .roster/config.yaml, or run: roster init --force' }
  );
}

const nonEmptyString: Check<string> = (value, key) => {
  if (typeof value !== 'string') fail(key, `must be a string, got ${typeof value}`);
  if (!value.trim()) fail(key, 'cannot be empty');
  return value;
};

const boolean: Check<boolean> = (value, key) => {
  if (typeof value !== 'boolean') fail(key, `must be a boolean, got ${typeof value}`);
  return value;
};

const positiveInteger: Check<number> = (value, key) => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    fail(key, `must be a positive integer, got ${String(value)}`);
  }
  return value;
};

const port: Check<number> = (value, key) => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 65535) {
    fail(key, `must be an integer between 0 and 65535, got ${String(value)}`);
  }
  return value;
};

const endpoint: Check<string> = (value, key) => {
  const path = nonEmptyString(value, key);
  if (!path.startsWith('/')) fail(key, `must start with "/", got "${path}"`);
  return path;
};

const runtimeMode: Check<RuntimeMode> = (value, key) => {
  if (value !== 'development' && value !== 'production') {
    fail(key, `must be "development" or "production", got "${String(value)}"`);
  }
  return value;
};

const logLevel: Check<LogLevel> = (value, key) => {
  if (!isLogLevel(value)) {
    fail(key, `must be one of silent, errors, warnings, info, debug; got "${String(value)}"`);
  }
  return value;
};
