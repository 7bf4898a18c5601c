import { z } from 'zod';

/** An optional payload field that reads as absent when malformed. */
export function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

export const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

/** Date-string order: `YYYY-MM-DD` sorts lexically. Missing dates sort first. */
export function compareDates(a: string | undefined, b: string | undefined): number {
  const left = a ?? '';
  const right = b ?? '';
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
