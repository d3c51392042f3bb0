import { describe, it, expect } from 'vitest';
import { applyUserChanges } from '../../../src/modules/users/policies/user-changes.policy';
import {
  assertEmailAvailable,
  isEmailChange,
} from '../../../src/modules/users/policies/email-uniqueness.policy';
import type { User } from '../../../src/modules/users/user.types';

const base: User = {
  id: 3,
  name: 'Ann Lee',
  email: 'ann@example.com',
  age: 31,
  createdAt: new Date('2024-03-01T09:00:00.000Z'),
};

describe('applyUserChanges', () => {
  it('keeps current values for blank or missing fields', () => {
    expect(applyUserChanges(base, { name: '   ', email: '' })).toEqual(base);
    expect(applyUserChanges(base, {})).toEqual(base);
  });

  it('trims and applies provided values', () => {
    expect(applyUserChanges(base, { name: ' Ann Smith ', email: 'ann@corp.test', age: 32 })).toEqual({
      ...base,
      name: 'Ann Smith',
      email: 'ann@corp.test',
      age: 32,
    });
  });

  it('can clear the age', () => {
    expect(applyUserChanges(base, { age: null }).age).toBeNull();
  });

  it('never mutates the input', () => {
    applyUserChanges(base, { name: 'Other' });
    expect(base.name).toBe('Ann Lee');
  });
});

describe('email uniqueness policy', () => {
  it('throws CONFLICT when the email is taken', () => {
    let caught: unknown;
    try {
      assertEmailAvailable(true, 'ann@example.com');
    } catch (err) {
      caught = err;
    }

    expect(caught).toMatchObject({
      code: 'CONFLICT',
      message: 'A user with this email already exists',
      meta: { email: 'ann@example.com' },
    });
  });

  it('passes when the email is free', () => {
    expect(() => assertEmailAvailable(false, 'ann@example.com')).not.toThrow();
  });

  it('treats emails as case-sensitive', () => {
    expect(isEmailChange('ann@example.com', 'ann@example.com')).toBe(false);
    expect(isEmailChange('ann@example.com', 'Ann@example.com')).toBe(true);
  });
});
