export const RSVP_STATUSES = ['accepted', 'declined', 'maybe'] as const;

export type RsvpStatus = (typeof RSVP_STATUSES)[number];

export interface PartyEvent {
  id: number;
  title: string;
  description: string | null;
  date: Date;
  location: string;
  ownerId: number;
}

export interface NewPartyEvent {
  title: string;
  description: string | null;
  date: Date;
  location: string;
}

/** Fields left undefined are kept; description may be cleared with null. */
export interface EventPatch {
  title?: string;
  description?: string | null;
  date?: Date;
  location?: string;
}

export interface Guest {
  id: number;
  eventId: number;
  name: string;
  email: string;
  invitedByUserId: number | null;
  responded: boolean;
}

export interface Rsvp {
  id: number;
  eventId: number;
  userId: number;
  status: RsvpStatus;
}

export interface Page {
  skip: number;
  limit: number;
}

export const DEFAULT_PAGE: Page = { skip: 0, limit: 50 };
