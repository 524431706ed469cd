/**
 * Error output for CLI commands.
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { RosterError, toError } from '@roster/core';

/**
 * Print a standardized error message and exit with status 1.
 *
 * @example
 * exitWithError('Config is invalid', ['Run: roster init --force']);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

/**
 * exitWithError() for a caught value; a RosterError's suggestion becomes
 * the next step.
 */
export function exitWithFailure(err: unknown, fallbackSteps: string[] = []): never {
  const error = toError(err);
  const steps = error instanceof RosterError && error.suggestion ? [error.suggestion] : fallbackSteps;
  exitWithError(error.message, steps);
}
