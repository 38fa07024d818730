import { type z } from 'zod';
import { AppError, ErrorCode } from '@soiree/shared';

export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown, message: string): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError(ErrorCode.VALIDATION, message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}
