import { type PartyEvent, type NewPartyEvent, type EventPatch, type Page, DEFAULT_PAGE } from './event';
import { type EventRepository, type GuestRepository, type RsvpRepository } from './event-ports';
import { type WithTransaction } from './ports';
import { applyEventPatch, isEmptyPatch } from './ownership';

export interface EventServiceDeps<Tx> {
  eventRepo: EventRepository<Tx>;
  guestRepo: GuestRepository<Tx>;
  rsvpRepo: RsvpRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
}

export class EventService<Tx> {
  constructor(private readonly deps: EventServiceDeps<Tx>) {}

  async createEvent(ownerId: number, input: NewPartyEvent): Promise<PartyEvent> {
    return this.deps.withTransaction((tx) => this.deps.eventRepo.create(tx, { ...input, ownerId }));
  }

  async listEvents(ownerId: number, page: Partial<Page> = {}): Promise<PartyEvent[]> {
    const resolved: Page = {
      skip: page.skip ?? DEFAULT_PAGE.skip,
      limit: page.limit ?? DEFAULT_PAGE.limit,
    };
    return this.deps.withTransaction((tx) => this.deps.eventRepo.listByOwner(tx, ownerId, resolved));
  }

  async getEvent(ownerId: number, eventId: number): Promise<PartyEvent> {
    return this.deps.withTransaction((tx) => this.requireOwned(tx, ownerId, eventId));
  }

  async updateEvent(ownerId: number, eventId: number, patch: EventPatch): Promise<PartyEvent> {
    const { eventRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const event = await this.requireOwned(tx, ownerId, eventId);
      if (isEmptyPatch(patch)) return event;
      return eventRepo.update(tx, applyEventPatch(event, patch));
    });
  }

  async deleteEvent(ownerId: number, eventId: number): Promise<void> {
    const { eventRepo, guestRepo, rsvpRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      await this.requireOwned(tx, ownerId, eventId);
      await rsvpRepo.deleteByEvent(tx, eventId);
      await guestRepo.deleteByEvent(tx, eventId);
      await eventRepo.delete(tx, eventId);
    });
  }

  private async requireOwned(tx: Tx, ownerId: number, eventId: number): Promise<PartyEvent> {
    const event = await this.deps.eventRepo.findOwned(tx, eventId, ownerId);
    if (!event) {
      throw new EventError('NOT_FOUND', 'Event not found');
    }
    return event;
  }
}

export class EventError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND',
    message: string,
  ) {
    super(message);
    this.name = 'EventError';
  }
}
