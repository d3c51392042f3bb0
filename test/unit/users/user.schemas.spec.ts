import { describe, it, expect } from 'vitest';
import {
  createUserSchema,
  normalizeAge,
  parseAgeInput,
  parseUserId,
} from '../../../src/modules/users/user.schemas';

describe('createUserSchema', () => {
  it('trims the name but keeps the email exactly as given', () => {
    expect(createUserSchema.parse({ name: '  Ann Lee ', email: ' ann@example.com ', age: 31 })).toEqual({
      name: 'Ann Lee',
      email: ' ann@example.com ',
      age: 31,
    });
  });

  it('measures length in characters, not UTF-16 units', () => {
    const wide = '\u{1F600}'.repeat(60);
    expect(createUserSchema.parse({ name: wide, email: 'a@example.com' }).name).toBe(wide);

    const tooWide = createUserSchema.safeParse({ name: '\u{1F600}'.repeat(101), email: 'a@example.com' });
    expect(tooWide.error?.issues[0]?.message).toBe('Name must be at most 100 characters');

    const email = `${'\u{1F600}'.repeat(140)}@example`;
    expect(createUserSchema.safeParse({ name: 'A', email }).success).toBe(true);

    const longEmail = createUserSchema.safeParse({ name: 'A', email: 'x'.repeat(151) });
    expect(longEmail.error?.issues[0]?.message).toBe('Email must be at most 150 characters');
  });

  it('stores an out-of-range or fractional age as unspecified', () => {
    expect(createUserSchema.parse({ name: 'A', email: 'a@example.com', age: 200 }).age).toBeNull();
    expect(createUserSchema.parse({ name: 'A', email: 'a@example.com', age: -1 }).age).toBeNull();
    expect(createUserSchema.parse({ name: 'A', email: 'a@example.com', age: 3.5 }).age).toBeNull();
    expect(createUserSchema.parse({ name: 'A', email: 'a@example.com' }).age).toBeNull();
  });

  it('keeps the age bounds inclusive', () => {
    expect(createUserSchema.parse({ name: 'A', email: 'a@example.com', age: 0 }).age).toBe(0);
    expect(createUserSchema.parse({ name: 'A', email: 'a@example.com', age: 150 }).age).toBe(150);
  });

  it('rejects blank and overlong fields', () => {
    const blank = createUserSchema.safeParse({ name: '   ', email: 'a@example.com' });
    expect(blank.success).toBe(false);
    expect(blank.error?.issues[0]?.message).toBe('Name must not be empty');

    const long = createUserSchema.safeParse({ name: 'x'.repeat(101), email: 'a@example.com' });
    expect(long.error?.issues[0]?.message).toBe('Name must be at most 100 characters');

    const noEmail = createUserSchema.safeParse({ name: 'A', email: '' });
    expect(noEmail.error?.issues[0]?.message).toBe('Email must not be empty');

    const blankEmail = createUserSchema.safeParse({ name: 'A', email: '   ' });
    expect(blankEmail.error?.issues[0]?.message).toBe('Email must not be empty');
  });
});

describe('normalizeAge', () => {
  it('accepts only integers within range', () => {
    expect(normalizeAge(42)).toBe(42);
    expect(normalizeAge(151)).toBeNull();
    expect(normalizeAge('42')).toBeNull();
    expect(normalizeAge(null)).toBeNull();
  });
});

describe('parseAgeInput', () => {
  it('distinguishes empty, valid and invalid input', () => {
    expect(parseAgeInput('')).toEqual({ kind: 'empty' });
    expect(parseAgeInput('   ')).toEqual({ kind: 'empty' });
    expect(parseAgeInput(' 42 ')).toEqual({ kind: 'valid', age: 42 });
    expect(parseAgeInput('0')).toEqual({ kind: 'valid', age: 0 });
    expect(parseAgeInput('abc')).toEqual({ kind: 'invalid' });
    expect(parseAgeInput('1.5')).toEqual({ kind: 'invalid' });
    expect(parseAgeInput('-1')).toEqual({ kind: 'invalid' });
    expect(parseAgeInput('151')).toEqual({ kind: 'invalid' });
  });
});

describe('parseUserId', () => {
  it('accepts positive integers', () => {
    expect(parseUserId('7')).toBe(7);
    expect(parseUserId(' 12 ')).toBe(12);
  });

  it('rejects anything else', () => {
    expect(parseUserId('')).toBeUndefined();
    expect(parseUserId('0')).toBeUndefined();
    expect(parseUserId('-3')).toBeUndefined();
    expect(parseUserId('abc')).toBeUndefined();
    expect(parseUserId('1e3')).toBeUndefined();
    expect(parseUserId('2147483648')).toBeUndefined();
  });
});
