import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = jewelryConfigSchema.safeParse(config);
 * assertValidated(parsed, 'Invalid jewelry configuration');
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}

/**
 * Parse `input` with `schema`, throwing a ValidationError on failure.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message?: string,
): z.output<S> {
  const parsed = schema.safeParse(input);
  assertValidated(parsed, message);
  return parsed.data;
}
