import { z } from 'zod';

import { ValidationError } from '@errors';

export const IdParamsSchema = z.object({
  id: z.string().uuid(),
});

/**
 * Parse request input, raising a 400 ValidationError with the zod issues
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodIssues(result.error.issues);
  }
  return result.data;
}
