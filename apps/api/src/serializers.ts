import { type PartyEvent, type Guest, type Rsvp, type PublicUser } from '@soiree/domain';
import { type EventResponse, type GuestResponse, type RsvpResponse, type UserResponse } from '@soiree/proto';

export function serializeUser(user: PublicUser): UserResponse {
  return { id: user.id, username: user.username, email: user.email };
}

export function serializeEvent(event: PartyEvent): EventResponse {
  return {
    id: event.id,
    title: event.title,
    description: event.description,
    date: event.date.toISOString(),
    location: event.location,
    owner_id: event.ownerId,
  };
}

export function serializeGuest(guest: Guest): GuestResponse {
  return {
    id: guest.id,
    event_id: guest.eventId,
    name: guest.name,
    email: guest.email,
    invited_by_user_id: guest.invitedByUserId,
    responded: guest.responded,
  };
}

export function serializeRsvp(rsvp: Rsvp): RsvpResponse {
  return {
    id: rsvp.id,
    event_id: rsvp.eventId,
    user_id: rsvp.userId,
    status: rsvp.status,
  };
}
