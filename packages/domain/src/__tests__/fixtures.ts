import { vi } from 'vitest';
import { type User } from '../user';
import { type PartyEvent, type NewPartyEvent, type Guest, type Rsvp, type RsvpStatus } from '../event';
import { type EventRepository, type GuestRepository, type RsvpRepository } from '../event-ports';
import { type UserRepository } from '../ports';

export const TX = { tx: 'test' };

export async function runInTx<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
  return fn(TX);
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 1,
    username: 'alice',
    email: 'alice@x.com',
    passwordHash: 'hashed:secret1',
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<PartyEvent> = {}): PartyEvent {
  return {
    id: 10,
    title: 'Party',
    description: null,
    date: new Date('2026-12-31T20:00:00.000Z'),
    location: 'Home',
    ownerId: 1,
    ...overrides,
  };
}

export function makeGuest(overrides: Partial<Guest> = {}): Guest {
  return {
    id: 100,
    eventId: 10,
    name: 'bob',
    email: 'bob@x.com',
    invitedByUserId: 1,
    responded: false,
    ...overrides,
  };
}

export function makeRsvp(overrides: Partial<Rsvp> = {}): Rsvp {
  return {
    id: 500,
    eventId: 10,
    userId: 1,
    status: 'accepted',
    ...overrides,
  };
}

export function createUserRepoMock(): UserRepository<unknown> {
  return {
    create: vi.fn(async (_tx: unknown, u: { username: string; email: string; passwordHash: string }): Promise<User | null> =>
      makeUser({ id: 7, ...u }),
    ),
    findByUsername: vi.fn(async () => null),
    findByUsernameOrEmail: vi.fn(async () => null),
    findById: vi.fn(async () => null),
  };
}

export function createEventRepoMock(): EventRepository<unknown> {
  return {
    create: vi.fn(async (_tx: unknown, e: NewPartyEvent & { ownerId: number }) => makeEvent({ ...e, id: 11 })),
    findById: vi.fn(async () => makeEvent()),
    findOwned: vi.fn(async () => makeEvent()),
    listByOwner: vi.fn(async () => [makeEvent()]),
    update: vi.fn(async (_tx: unknown, e: PartyEvent) => e),
    delete: vi.fn(async () => {}),
  };
}

export function createGuestRepoMock(): GuestRepository<unknown> {
  let nextId = 200;
  return {
    create: vi.fn(
      async (_tx: unknown, g: { eventId: number; name: string; email: string; invitedByUserId: number }) =>
        makeGuest({ id: nextId++, ...g }),
    ),
    findById: vi.fn(async () => makeGuest()),
    findByEventAndEmail: vi.fn(async () => null),
    listByEvent: vi.fn(async () => [makeGuest()]),
    markResponded: vi.fn(async () => {}),
    delete: vi.fn(async () => {}),
    deleteByEvent: vi.fn(async () => {}),
  };
}

export function createRsvpRepoMock(): RsvpRepository<unknown> {
  return {
    create: vi.fn(async (_tx: unknown, r: { eventId: number; userId: number; status: RsvpStatus }) =>
      makeRsvp({ id: 501, ...r }),
    ),
    findByEventAndUser: vi.fn(async () => null),
    updateStatus: vi.fn(async (_tx: unknown, id: number, status: RsvpStatus) => makeRsvp({ id, status })),
    listByEvent: vi.fn(async () => [makeRsvp()]),
    deleteByEvent: vi.fn(async () => {}),
  };
}
