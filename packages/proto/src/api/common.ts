import { z } from 'zod';

/** Largest value of a Postgres INTEGER column; SERIAL ids never exceed it. */
export const MAX_ID = 2_147_483_647;

export const IdSchema = z.coerce.number().int().positive().max(MAX_ID);

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email('Invalid email address')
  .max(128, 'Email must be at most 128 characters');

export const DetailResponseSchema = z.object({
  detail: z.string(),
});

export const HealthResponseSchema = z.object({
  message: z.literal('Healthy'),
});

export type DetailResponse = z.infer<typeof DetailResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
