import { z } from 'zod';

/** Largest value of a SERIAL column. */
export const MAX_RECORD_ID = 2_147_483_647;

export const RecordIdSchema = z.number().int().positive().max(MAX_RECORD_ID);

/** `:id` path parameters of numeric records (articles and comments). */
export const NumericIdParamSchema = z.object({
  id: z.coerce.number().pipe(RecordIdSchema),
});

export const RefParamSchema = z.object({
  ref: z.string().min(1),
});

export const UserIdParamSchema = z.object({
  id: z.string().min(1),
});

export type NumericIdParam = z.infer<typeof NumericIdParamSchema>;
