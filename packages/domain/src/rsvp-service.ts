import { type Rsvp, type RsvpStatus } from './event';
import { type User } from './user';
import { type EventRepository, type GuestRepository, type RsvpRepository } from './event-ports';
import { type WithTransaction } from './ports';
import { canRsvp } from './ownership';

export interface RsvpServiceDeps<Tx> {
  eventRepo: EventRepository<Tx>;
  guestRepo: GuestRepository<Tx>;
  rsvpRepo: RsvpRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
}

export class RsvpService<Tx> {
  constructor(private readonly deps: RsvpServiceDeps<Tx>) {}

  /** Creates the caller's RSVP or overwrites its status; no history is kept. */
  async submitRsvp(user: User, eventId: number, status: RsvpStatus): Promise<Rsvp> {
    const { eventRepo, guestRepo, rsvpRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const event = await eventRepo.findById(tx, eventId);
      if (!event) {
        throw new RsvpError('NOT_FOUND', 'Event not found');
      }

      const guest = await guestRepo.findByEventAndEmail(tx, eventId, user.email);
      if (!canRsvp(event, user, guest)) {
        throw new RsvpError('FORBIDDEN', 'Must be invited or owner');
      }

      const existing = await rsvpRepo.findByEventAndUser(tx, eventId, user.id);
      const rsvp = existing
        ? await rsvpRepo.updateStatus(tx, existing.id, status)
        : await rsvpRepo.create(tx, { eventId, userId: user.id, status });

      if (guest && !guest.responded) {
        await guestRepo.markResponded(tx, guest.id);
      }

      return rsvp;
    });
  }

  async getMyRsvp(userId: number, eventId: number): Promise<Rsvp> {
    const rsvp = await this.deps.withTransaction((tx) =>
      this.deps.rsvpRepo.findByEventAndUser(tx, eventId, userId),
    );
    if (!rsvp) {
      throw new RsvpError('NOT_FOUND', 'RSVP not found');
    }
    return rsvp;
  }

  async listRsvps(ownerId: number, eventId: number): Promise<Rsvp[]> {
    const { eventRepo, rsvpRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const event = await eventRepo.findOwned(tx, eventId, ownerId);
      if (!event) {
        throw new RsvpError('NOT_FOUND', 'Event not found');
      }
      return rsvpRepo.listByEvent(tx, event.id);
    });
  }
}

export class RsvpError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND' | 'FORBIDDEN',
    message: string,
  ) {
    super(message);
    this.name = 'RsvpError';
  }
}
