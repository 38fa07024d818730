import { type Guest, type PartyEvent } from './event';
import { type EventRepository, type GuestRepository } from './event-ports';
import { type WithTransaction } from './ports';
import { defaultGuestName, normalizeEmail } from './ownership';

export interface GuestServiceDeps<Tx> {
  eventRepo: EventRepository<Tx>;
  guestRepo: GuestRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
}

export class GuestService<Tx> {
  constructor(private readonly deps: GuestServiceDeps<Tx>) {}

  async addGuest(ownerId: number, eventId: number, input: { name: string; email: string }): Promise<Guest> {
    const { guestRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const event = await this.requireOwned(tx, ownerId, eventId);
      return guestRepo.create(tx, {
        eventId: event.id,
        name: input.name,
        email: normalizeEmail(input.email),
        invitedByUserId: ownerId,
      });
    });
  }

  /**
   * Adds a guest per email unless the event already has one under that
   * address. Returns only the guests created by this call.
   */
  async inviteByEmail(ownerId: number, eventId: number, emails: string[]): Promise<Guest[]> {
    const { guestRepo } = this.deps;
    const unique = [...new Set(emails.map(normalizeEmail))];

    return this.deps.withTransaction(async (tx) => {
      const event = await this.requireOwned(tx, ownerId, eventId);

      const created: Guest[] = [];
      for (const email of unique) {
        const existing = await guestRepo.findByEventAndEmail(tx, event.id, email);
        if (existing) continue;

        created.push(
          await guestRepo.create(tx, {
            eventId: event.id,
            name: defaultGuestName(email),
            email,
            invitedByUserId: ownerId,
          }),
        );
      }
      return created;
    });
  }

  async listGuests(ownerId: number, eventId: number): Promise<Guest[]> {
    return this.deps.withTransaction(async (tx) => {
      const event = await this.requireOwned(tx, ownerId, eventId);
      return this.deps.guestRepo.listByEvent(tx, event.id);
    });
  }

  async removeGuest(ownerId: number, eventId: number, guestId: number): Promise<void> {
    const { guestRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const event = await this.requireOwned(tx, ownerId, eventId);
      const guest = await guestRepo.findById(tx, guestId);
      if (!guest || guest.eventId !== event.id) {
        throw new GuestError('NOT_FOUND', 'Guest not found');
      }
      await guestRepo.delete(tx, guest.id);
    });
  }

  private async requireOwned(tx: Tx, ownerId: number, eventId: number): Promise<PartyEvent> {
    const event = await this.deps.eventRepo.findOwned(tx, eventId, ownerId);
    if (!event) {
      throw new GuestError('NOT_FOUND', 'Event not found');
    }
    return event;
  }
}

export class GuestError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND',
    message: string,
  ) {
    super(message);
    this.name = 'GuestError';
  }
}
