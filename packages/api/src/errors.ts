/**
 * Error masking
 *
 * Maps the errors a response carries onto what clients may see:
 * - parse and validation errors (and any GraphQLError thrown on purpose)
 *   pass through untouched
 * - client-exposed RosterErrors keep their message and gain
 *   extensions.code (BAD_USER_INPUT, NOT_FOUND)
 * - everything else is logged; production clients get only
 *   "Unexpected error.", development clients get the message and stack
 */

import { GraphQLError } from 'graphql';
import { RosterError, toError, type Logger, type RuntimeMode } from '@roster/core';

export const INTERNAL_ERROR_CODE = 'INTERNAL_SERVER_ERROR';

const CLIENT_ERROR_CODES: Record<string, string> = {
  ERR_INVALID_FIELD: 'BAD_USER_INPUT',
  ERR_NOT_FOUND: 'NOT_FOUND',
};

/**
 * GraphQL extensions.code for a RosterError.
 */
export function graphQLErrorCode(error: RosterError): string {
  if (error.exposure !== 'client') {
    return INTERNAL_ERROR_CODE;
  }
  return CLIENT_ERROR_CODES[error.code] ?? 'BAD_REQUEST';
}

export interface ErrorMaskerOptions {
  mode: RuntimeMode;
  logger: Logger;
}

export type MaskError = (error: unknown, message: string) => Error;

export function createErrorMasker({ mode, logger }: ErrorMaskerOptions): MaskError {
  return (error: unknown, message: string): Error => {
    const located = error instanceof GraphQLError ? error : null;
    const original = located ? located.originalError : toError(error);

    if (located && (!original || original instanceof GraphQLError)) {
      return located;
    }

    const cause = original ?? toError(error);
    const position = located
      ? { nodes: located.nodes, source: located.source, positions: located.positions, path: located.path }
      : {};

    if (cause instanceof RosterError && cause.exposure === 'client') {
      return new GraphQLError(cause.message, {
        ...position,
        originalError: cause,
        extensions: { code: graphQLErrorCode(cause), ...pickField(cause) },
      });
    }

    logger.error('Unexpected error during GraphQL execution', {
      path: located?.path?.join('.'),
      error: cause,
    });

    if (mode === 'production') {
      return new GraphQLError(message, {
        ...position,
        extensions: { code: INTERNAL_ERROR_CODE },
      });
    }

    return new GraphQLError(cause.message, {
      ...position,
      originalError: cause,
      extensions: {
        code: cause instanceof RosterError ? cause.code : INTERNAL_ERROR_CODE,
        stack: cause.stack?.split('\n') ?? [],
      },
    });
  };
}

function pickField(error: RosterError): { field?: string } {
  return typeof error.context.field === 'string' ? { field: error.context.field } : {};
}
