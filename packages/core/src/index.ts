/**
 * @roster/core - Storage, validation, configuration and logging for Roster
 */

// Version
export { ROSTER_VERSION } from './version.js';

// Errors
export {
  RosterError,
  ConfigError,
  ValidationError,
  NotFoundError,
  DatabaseError,
  toError,
} from './errors/RosterError.js';
export type { ErrorContext, ErrorExposure, RosterErrorJSON } from './errors/RosterError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  isLogLevel,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel, LogContext } from './logging/Logger.js';

// Config
export * from './config/index.js';

// Validation
export {
  validateNewPerson,
  validateNewComment,
  validateCommentBody,
  isEmail,
  isHttpUrl,
} from './validation/recordValidation.js';

// Storage
export { StorageBackend } from './storage/StorageBackend.js';
export type { StorageStats, SeedResult } from './storage/StorageBackend.js';
export { PGliteBackend, PGliteDatabase } from './storage/backends/PGliteBackend.js';
export { ConnectionPool, ConnectionLease } from './storage/ConnectionPool.js';
export type { ConnectionPoolOptions, ConnectionPoolStats } from './storage/ConnectionPool.js';
export { createStoragePool } from './storage/openStorage.js';
export type { StoragePool, StoragePoolOptions } from './storage/openStorage.js';

// Seed data
export { SAMPLE_PERSON } from './seed/seedData.js';

// Utils
export { formatFullName } from './utils/names.js';
