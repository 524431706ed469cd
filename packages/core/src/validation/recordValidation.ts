/**
 * Field validation for new people and comments.
 *
 * Runs before any write; a failed check throws ValidationError naming the
 * input field and nothing is stored.
 */

import type { NewPersonInput, NewCommentInput } from '@roster/types';
import { ValidationError } from '../errors/RosterError.js';

/** local@domain.tld with no whitespace and a single @ */
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const REQUIRED_PERSON_FIELDS = ['firstName', 'lastName', 'email', 'jobTitle'] as const;

function requireText(field: string, value: string): void {
  if (value.trim() === '') {
    throw new ValidationError(field, `${field} cannot be empty`);
  }
}

export function isEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

/**
 * True for absolute http(s) URLs.
 */
export function isHttpUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return url.protocol === 'http:' || url.protocol === 'https:';
}

/**
 * Validate a new person.
 *
 * Returns the input with `avatar` normalized to null when absent or blank.
 */
export function validateNewPerson(input: NewPersonInput): NewPersonInput & { avatar: string | null } {
  for (const field of REQUIRED_PERSON_FIELDS) {
    requireText(field, input[field]);
  }
  if (!isEmail(input.email)) {
    throw new ValidationError('email', `email "${input.email}" is not a valid email address`);
  }

  const avatar = input.avatar?.trim() ? input.avatar : null;
  if (avatar !== null && !isHttpUrl(avatar)) {
    throw new ValidationError('avatar', `avatar "${avatar}" must be an http or https URL`);
  }

  return { ...input, avatar };
}

export function validateCommentBody(body: string): string {
  requireText('comment', body);
  return body;
}

export function validateNewComment(input: NewCommentInput): NewCommentInput {
  requireText('personId', input.personId);
  validateCommentBody(input.comment);
  return input;
}
