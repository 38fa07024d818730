import { z } from 'zod';
import { IdSchema, MAX_ID } from './common';

const TitleSchema = z
  .string()
  .trim()
  .min(1, 'Title is required')
  .max(128, 'Title must be at most 128 characters');

const LocationSchema = z
  .string()
  .trim()
  .min(1, 'Location is required')
  .max(256, 'Location must be at most 256 characters');

const DescriptionSchema = z.string().max(10_000).nullable();

/** ISO-8601 date-time; offsets are honoured, a bare local time is read in server time. */
export const EventDateSchema = z.string().min(1, 'Date is required').pipe(z.coerce.date());

export const CreateEventRequestSchema = z.object({
  title: TitleSchema,
  description: DescriptionSchema.optional(),
  date: EventDateSchema,
  location: LocationSchema,
});

export const UpdateEventRequestSchema = z.object({
  title: TitleSchema.optional(),
  description: DescriptionSchema.optional(),
  date: EventDateSchema.optional(),
  location: LocationSchema.optional(),
});

export const MAX_PAGE_SIZE = 1000;

export const ListEventsQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).max(MAX_ID).default(0),
  limit: z.coerce.number().int().min(0).max(MAX_PAGE_SIZE).default(50),
});

export const EventParamsSchema = z.object({
  eventId: IdSchema,
});

export const EventResponseSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  date: z.string().datetime(),
  location: z.string(),
  owner_id: z.number().int(),
});

export type CreateEventRequest = z.infer<typeof CreateEventRequestSchema>;
export type UpdateEventRequest = z.infer<typeof UpdateEventRequestSchema>;
export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
export type EventResponse = z.infer<typeof EventResponseSchema>;
