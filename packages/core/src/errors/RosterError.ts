/**
 * RosterError - Error hierarchy for Roster
 *
 * Every error carries a stable `code` and an `exposure`:
 * - client: caused by the request (bad input, unknown id). Safe to show
 *   to API callers as-is.
 * - internal: caused by the service (config, database). Logged; callers
 *   only see an opaque message in production.
 *
 * Error types:
 * - ConfigError: configuration parsing/validation errors
 * - ValidationError: a submitted field value is empty or malformed
 * - NotFoundError: a referenced id does not resolve
 * - DatabaseError: unexpected storage failure
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  entity?: 'Person' | 'Comment';
  id?: string;
  field?: string;
  operation?: string;
  filePath?: string;
  [key: string]: unknown;
}

export type ErrorExposure = 'client' | 'internal';

/**
 * JSON representation of RosterError
 */
export interface RosterErrorJSON {
  code: string;
  exposure: ErrorExposure;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

export abstract class RosterError extends Error {
  abstract readonly code: string;
  abstract readonly exposure: ErrorExposure;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, options: { suggestion?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = options.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): RosterErrorJSON {
    return {
      code: this.code,
      exposure: this.exposure,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml values that cannot be used
 *
 * Code: ERR_CONFIG_INVALID
 */
export class ConfigError extends RosterError {
  readonly code = 'ERR_CONFIG_INVALID';
  readonly exposure = 'internal' as const;
}

/**
 * Validation error - an empty required field, malformed email or avatar URL,
 * or an empty comment body.
 *
 * `context.field` names the offending input field.
 *
 * Code: ERR_INVALID_FIELD
 */
export class ValidationError extends RosterError {
  readonly code = 'ERR_INVALID_FIELD';
  readonly exposure = 'client' as const;

  constructor(field: string, message: string, context: ErrorContext = {}) {
    super(message, { ...context, field });
  }

  get field(): string {
    return String(this.context.field);
  }
}

/**
 * Not-found error - an id that names no stored record
 *
 * Code: ERR_NOT_FOUND
 */
export class NotFoundError extends RosterError {
  readonly code = 'ERR_NOT_FOUND';
  readonly exposure = 'client' as const;

  constructor(entity: 'Person' | 'Comment', id: string, context: ErrorContext = {}) {
    super(`${entity} "${id}" not found`, { ...context, entity, id });
  }
}

/**
 * Database error - a driver failure the storage layer did not anticipate
 *
 * Code: ERR_DATABASE
 */
export class DatabaseError extends RosterError {
  readonly code = 'ERR_DATABASE';
  readonly exposure = 'internal' as const;
}

/**
 * Narrow an unknown thrown value to an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
