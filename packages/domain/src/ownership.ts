import { type PartyEvent, type EventPatch, type Guest, type RsvpStatus, RSVP_STATUSES } from './event';
import { type User } from './user';

export function isEventOwner(event: PartyEvent, userId: number): boolean {
  return event.ownerId === userId;
}

/** Owners may always answer; anyone else needs a guest entry under their email. */
export function canRsvp(event: PartyEvent, user: User, guest: Guest | null): boolean {
  if (isEventOwner(event, user.id)) return true;
  return guest !== null && guest.email === user.email;
}

export function isRsvpStatus(value: string): value is RsvpStatus {
  return RSVP_STATUSES.some((status) => status === value);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function defaultGuestName(email: string): string {
  const at = email.indexOf('@');
  const local = at === -1 ? email : email.slice(0, at);
  return local.length > 0 ? local : email;
}

export function applyEventPatch(event: PartyEvent, patch: EventPatch): PartyEvent {
  const next: PartyEvent = { ...event };
  if (patch.title !== undefined) next.title = patch.title;
  if (patch.description !== undefined) next.description = patch.description;
  if (patch.date !== undefined) next.date = patch.date;
  if (patch.location !== undefined) next.location = patch.location;
  return next;
}

export function isEmptyPatch(patch: EventPatch): boolean {
  return (
    patch.title === undefined &&
    patch.description === undefined &&
    patch.date === undefined &&
    patch.location === undefined
  );
}
