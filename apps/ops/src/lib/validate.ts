import type { z } from 'zod';
import { ValidationError } from './errors.js';

/** Parse command or service input; zod failures become ValidationError. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => issue.message).join('; '),
      result.error.flatten().fieldErrors,
    );
  }
  return result.data;
}

/** Commander option parser for numeric values; zod rejects the NaN. */
export function toNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}
