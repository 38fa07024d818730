import { z } from 'zod';

export const RsvpStatusSchema = z.enum(['accepted', 'declined', 'maybe']);

export const RsvpRequestSchema = z.object({
  status: RsvpStatusSchema,
});

export const RsvpResponseSchema = z.object({
  id: z.number().int(),
  event_id: z.number().int(),
  user_id: z.number().int(),
  status: RsvpStatusSchema,
});

export type RsvpRequest = z.infer<typeof RsvpRequestSchema>;
export type RsvpResponse = z.infer<typeof RsvpResponseSchema>;
