import { z } from 'zod';

export const idParamSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/, 'Expected a positive integer id')
    .transform(Number)
    .pipe(z.number().int().positive()),
});

/** Comma-separated list of positive integer ids, e.g. "3,7". Empty entries are ignored. */
export const idListSchema = z.string().transform((value, ctx) => {
  const parts = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  const ids: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part) || Number(part) === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${part}" is not a valid id`,
      });
      return z.NEVER;
    }
    ids.push(Number(part));
  }
  return ids;
});

export type IdParam = z.infer<typeof idParamSchema>;
