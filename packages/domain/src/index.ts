export { type User, type PublicUser, toPublicUser } from './user';
export {
  RSVP_STATUSES,
  DEFAULT_PAGE,
  type RsvpStatus,
  type PartyEvent,
  type NewPartyEvent,
  type EventPatch,
  type Guest,
  type Rsvp,
  type Page,
} from './event';
export {
  isEventOwner,
  canRsvp,
  isRsvpStatus,
  normalizeEmail,
  defaultGuestName,
  applyEventPatch,
  isEmptyPatch,
} from './ownership';
export type {
  WithTransaction,
  UserRepository,
  PasswordHasher,
  TokenService,
} from './ports';
export type { EventRepository, GuestRepository, RsvpRepository } from './event-ports';
export { AuthService, AuthError, type AuthServiceDeps, type LoginResult } from './auth-service';
export { EventService, EventError, type EventServiceDeps } from './event-service';
export { GuestService, GuestError, type GuestServiceDeps } from './guest-service';
export { RsvpService, RsvpError, type RsvpServiceDeps } from './rsvp-service';
