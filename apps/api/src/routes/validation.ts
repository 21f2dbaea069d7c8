import { type z } from 'zod';
import { AppError } from '@inkwell/shared';

export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message: string,
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validation(
      message,
      parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}
