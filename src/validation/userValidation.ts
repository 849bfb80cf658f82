/**
 * Validation for user tool arguments.
 *
 * Pure functions over raw (unknown) input. Each returns the cleaned value or
 * throws an INVALID_INPUT UserStoreError; none of them touches storage.
 */

import { z } from 'zod';
import { invalidInput } from '../store/errors.js';
import type { UserFields } from '../store/types.js';

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 1000;
export const DEFAULT_OFFSET = 0;

export const MESSAGES = {
  name: 'Name must be a non-empty string',
  email: 'Email must be a valid email address',
  id: 'User ID must be a positive integer',
  limit: 'Limit must be a positive integer',
  offset: 'Offset must be a non-negative integer',
  fields: 'At least one field (name or email) must be provided',
  args: 'Tool arguments must be an object',
} as const;

const nameSchema = z.string().trim().min(1);

// Exactly one "@" with something on either side.
const emailSchema = z.string().trim().regex(/^[^@]+@[^@]+$/);

const idSchema = z.number().int().positive();

// .int() stops at MAX_SAFE_INTEGER; larger integral values are still valid here.
const limitSchema = z.number().positive().refine(Number.isInteger).transform((n) => Math.min(n, MAX_LIMIT));

// Offsets past MAX_SAFE_INTEGER are pinned to it so SQLite still binds an exact integer.
const offsetSchema = z
  .number()
  .nonnegative()
  .refine(Number.isInteger)
  .transform((n) => Math.min(n, Number.MAX_SAFE_INTEGER));

const argsSchema = z.record(z.string(), z.unknown());

function check<T>(schema: z.ZodType<T>, value: unknown, message: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw invalidInput(message);
  }
  return result.data;
}

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

export function validateName(value: unknown): string {
  return check(nameSchema, value, MESSAGES.name);
}

export function validateEmail(value: unknown): string {
  return check(emailSchema, value, MESSAGES.email);
}

export function validateUserId(value: unknown): number {
  return check(idSchema, value, MESSAGES.id);
}

/**
 * Absent → 100; above 1000 is clamped to 1000 rather than rejected.
 */
export function validateLimit(value: unknown): number {
  return isAbsent(value) ? DEFAULT_LIMIT : check(limitSchema, value, MESSAGES.limit);
}

/**
 * Absent → 0. An offset beyond every row yields an empty page.
 */
export function validateOffset(value: unknown): number {
  return isAbsent(value) ? DEFAULT_OFFSET : check(offsetSchema, value, MESSAGES.offset);
}

/**
 * Validate the fields of a partial update. A field counts as supplied unless
 * it is undefined or null; a supplied field must itself be valid.
 */
export function validateUpdateFields(name: unknown, email: unknown): UserFields {
  if (isAbsent(name) && isAbsent(email)) {
    throw invalidInput(MESSAGES.fields);
  }

  const fields: UserFields = {};
  if (!isAbsent(name)) fields.name = validateName(name);
  if (!isAbsent(email)) fields.email = validateEmail(email);
  return fields;
}

/**
 * Tool arguments must arrive as a plain object. Absent arguments are empty.
 */
export function validateArgs(value: unknown): Record<string, unknown> {
  return isAbsent(value) ? {} : check(argsSchema, value, MESSAGES.args);
}
