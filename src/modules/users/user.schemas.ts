/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes input validation for the Users module.
 * - Prevents invalid values from reaching the DAL.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Age degrades instead of failing: out-of-range or non-numeric -> null (unspecified).
 * - Email is matched exactly; no case folding, no trimming.
 */

import { z } from 'zod';

export const MIN_AGE = 0;
export const MAX_AGE = 150;
export const NAME_MAX_LENGTH = 100;
export const EMAIL_MAX_LENGTH = 150;

// ids are int4 (serial)
const MAX_USER_ID = 2_147_483_647;

const ageSchema = z.number().int().min(MIN_AGE).max(MAX_AGE);

export function normalizeAge(value: unknown): number | null {
  const parsed = ageSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

// Column limits are in characters, not UTF-16 code units.
function withinLength(value: string, max: number): boolean {
  return [...value].length <= max;
}

export const nameSchema = z
  .string()
  .trim()
  .min(1, 'Name must not be empty')
  .refine(
    (v) => withinLength(v, NAME_MAX_LENGTH),
    `Name must be at most ${NAME_MAX_LENGTH} characters`,
  );

// Stored exactly as given: lookups compare the raw value.
export const emailSchema = z
  .string()
  .refine((v) => v.trim() !== '', 'Email must not be empty')
  .refine(
    (v) => withinLength(v, EMAIL_MAX_LENGTH),
    `Email must be at most ${EMAIL_MAX_LENGTH} characters`,
  );

export const createUserSchema = z.object({
  name: nameSchema,
  email: emailSchema,
  age: z.number().nullable().optional().transform(normalizeAge),
});

export type CreateUserValues = z.infer<typeof createUserSchema>;

export const userIdSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'ID must be a positive integer')
  .transform(Number)
  .pipe(z.number().int().min(1).max(MAX_USER_ID));

export function parseUserId(raw: string): number | undefined {
  const parsed = userIdSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export type AgeInput = { kind: 'empty' } | { kind: 'valid'; age: number } | { kind: 'invalid' };

/**
 * Reads an age typed by an operator. Callers decide what "invalid" means for them:
 * create stores it as unspecified, update keeps the previous value.
 */
export function parseAgeInput(raw: string): AgeInput {
  const trimmed = raw.trim();
  if (trimmed === '') return { kind: 'empty' };
  if (!/^-?\d+$/.test(trimmed)) return { kind: 'invalid' };

  const age = normalizeAge(Number(trimmed));
  return age === null ? { kind: 'invalid' } : { kind: 'valid', age };
}
