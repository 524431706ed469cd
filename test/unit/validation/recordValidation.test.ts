/**
 * Record validation tests
 *
 * Tests:
 * - Required person fields reject blank values
 * - Email and avatar formats
 * - Avatar normalization
 * - Comment body and owner id
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  ValidationError,
  validateNewPerson,
  validateNewComment,
  validateCommentBody,
  isEmail,
  isHttpUrl,
} from '@roster/core';
import type { NewPersonInput } from '@roster/types';

const ada: NewPersonInput = {
  firstName: 'Ada',
  lastName: 'Lovelace',
  email: 'ada@example.com',
  jobTitle: 'Analyst',
};

function rejectsWith(fn: () => unknown, field: string, message: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof ValidationError);
    assert.strictEqual(err.field, field);
    assert.strictEqual(err.message, message);
    return true;
  });
}

// =============================================================================
// TESTS: validateNewPerson
// =============================================================================

describe('validateNewPerson', () => {
  it('should accept a complete person and default avatar to null', () => {
    assert.deepStrictEqual(validateNewPerson(ada), { ...ada, avatar: null });
  });

  it('should keep a valid avatar URL', () => {
    const avatar = 'https://example.com/a.png';
    assert.strictEqual(validateNewPerson({ ...ada, avatar }).avatar, avatar);
  });

  it('should treat a blank avatar as absent', () => {
    assert.strictEqual(validateNewPerson({ ...ada, avatar: '   ' }).avatar, null);
  });

  for (const field of ['firstName', 'lastName', 'email', 'jobTitle'] as const) {
    it(`should reject a blank ${field}`, () => {
      rejectsWith(() => validateNewPerson({ ...ada, [field]: ' ' }), field, `${field} cannot be empty`);
    });
  }

  it('should report the first blank field in declaration order', () => {
    rejectsWith(
      () => validateNewPerson({ ...ada, lastName: '', jobTitle: '' }),
      'lastName',
      'lastName cannot be empty'
    );
  });

  it('should reject a malformed email', () => {
    rejectsWith(
      () => validateNewPerson({ ...ada, email: 'ada.example.com' }),
      'email',
      'email "ada.example.com" is not a valid email address'
    );
  });

  it('should reject a non-http avatar', () => {
    rejectsWith(
      () => validateNewPerson({ ...ada, avatar: 'ftp://example.com/a.png' }),
      'avatar',
      'avatar "ftp://example.com/a.png" must be an http or https URL'
    );
  });
});

// =============================================================================
// TESTS: Comments
// =============================================================================

describe('validateNewComment', () => {
  it('should accept a body and owner', () => {
    const input = { personId: 'p-1', comment: 'Hello' };
    assert.deepStrictEqual(validateNewComment(input), input);
  });

  it('should check personId before the body', () => {
    rejectsWith(() => validateNewComment({ personId: '', comment: '' }), 'personId', 'personId cannot be empty');
  });

  it('should reject a whitespace-only body', () => {
    rejectsWith(() => validateCommentBody('\n\t '), 'comment', 'comment cannot be empty');
  });
});

// =============================================================================
// TESTS: Format helpers
// =============================================================================

describe('isEmail / isHttpUrl', () => {
  it('isEmail', () => {
    assert.strictEqual(isEmail('matt@umbrage.com'), true);
    assert.strictEqual(isEmail('a@b'), false);
    assert.strictEqual(isEmail('a b@c.d'), false);
    assert.strictEqual(isEmail('a@@c.d'), false);
  });

  it('isHttpUrl', () => {
    assert.strictEqual(isHttpUrl('http://example.com'), true);
    assert.strictEqual(isHttpUrl('https://example.com/x?y=1'), true);
    assert.strictEqual(isHttpUrl('mailto:a@b.c'), false);
    assert.strictEqual(isHttpUrl('not a url'), false);
  });
});
