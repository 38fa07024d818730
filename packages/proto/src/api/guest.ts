import { z } from 'zod';
import { EmailSchema, IdSchema } from './common';

export const CreateGuestRequestSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(128, 'Name must be at most 128 characters'),
  email: EmailSchema,
});

export const InviteRequestSchema = z.object({
  guest_emails: z.array(EmailSchema).max(500, 'At most 500 emails per invite'),
});

export const GuestParamsSchema = z.object({
  eventId: IdSchema,
  guestId: IdSchema,
});

export const GuestResponseSchema = z.object({
  id: z.number().int(),
  event_id: z.number().int(),
  name: z.string(),
  email: z.string(),
  invited_by_user_id: z.number().int().nullable(),
  responded: z.boolean(),
});

export type CreateGuestRequest = z.infer<typeof CreateGuestRequestSchema>;
export type InviteRequest = z.infer<typeof InviteRequestSchema>;
export type GuestResponse = z.infer<typeof GuestResponseSchema>;
