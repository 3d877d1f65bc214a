/**
 * Input Validator
 *
 * Tool arguments are checked against zod schemas before any query is built.
 * Failures surface as ValidationError naming the offending field.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';

/** Most names a batch tool accepts in one call */
export const MAX_BATCH_NAMES = 25;

const MAX_NAME_LENGTH = 200;

/**
 * Parse tool arguments; the first issue becomes the error.
 */
export function parseToolInput<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const result = schema.safeParse(args ?? {});
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue.path.length > 0 ? issue.path.join('.') : 'input';
  throw new ValidationError(field, issue.message);
}

/**
 * Reject `min > max` when both bounds are given.
 */
export function assertOrderedRange(min: number | undefined, max: number | undefined, maxField: string): void {
  if (min !== undefined && max !== undefined && min > max) {
    throw new ValidationError(maxField, `must be greater than or equal to the minimum (${min}), received ${max}`);
  }
}

export const planetNameSchema = z.string()
  .trim()
  .min(1, 'must not be empty')
  .max(MAX_NAME_LENGTH, `must be at most ${MAX_NAME_LENGTH} characters`);

/**
 * One name or a list of names; trimmed and de-duplicated, order kept.
 */
export const planetNamesSchema = z.preprocess(
  value => (typeof value === 'string' ? [value] : value),
  z.array(planetNameSchema).min(1, 'must name at least one planet')
)
  .transform(names => [...new Set(names)])
  .pipe(z.array(z.string()).max(MAX_BATCH_NAMES, `must name at most ${MAX_BATCH_NAMES} planets`));

/**
 * Substring for a LIKE match; the LIKE wildcards are not accepted.
 */
export const substringSchema = z.string()
  .trim()
  .min(1, 'must not be empty')
  .max(MAX_NAME_LENGTH, `must be at most ${MAX_NAME_LENGTH} characters`)
  .regex(/^[^%_]*$/, 'must not contain % or _');

/**
 * Row count in 1..max.
 */
export function countSchema(max: number) {
  return z.number()
    .int('must be an integer')
    .positive('must be greater than 0')
    .max(max, `must not exceed ${max}`);
}

export const nonNegativeSchema = z.number()
  .finite()
  .nonnegative('must not be negative');

export const yearSchema = z.number()
  .int('must be an integer')
  .min(1980, 'must be 1980 or later')
  .max(2100, 'must be 2100 or earlier');
