import { type PartyEvent, type NewPartyEvent, type Guest, type Rsvp, type RsvpStatus, type Page } from './event';

export interface EventRepository<Tx> {
  create(tx: Tx, event: NewPartyEvent & { ownerId: number }): Promise<PartyEvent>;
  findById(tx: Tx, id: number): Promise<PartyEvent | null>;
  /** Matches only when the event exists and belongs to ownerId. */
  findOwned(tx: Tx, id: number, ownerId: number): Promise<PartyEvent | null>;
  listByOwner(tx: Tx, ownerId: number, page: Page): Promise<PartyEvent[]>;
  update(tx: Tx, event: PartyEvent): Promise<PartyEvent>;
  delete(tx: Tx, id: number): Promise<void>;
}

export interface GuestRepository<Tx> {
  create(
    tx: Tx,
    guest: { eventId: number; name: string; email: string; invitedByUserId: number },
  ): Promise<Guest>;
  findById(tx: Tx, id: number): Promise<Guest | null>;
  findByEventAndEmail(tx: Tx, eventId: number, email: string): Promise<Guest | null>;
  listByEvent(tx: Tx, eventId: number): Promise<Guest[]>;
  markResponded(tx: Tx, id: number): Promise<void>;
  delete(tx: Tx, id: number): Promise<void>;
  deleteByEvent(tx: Tx, eventId: number): Promise<void>;
}

export interface RsvpRepository<Tx> {
  create(tx: Tx, rsvp: { eventId: number; userId: number; status: RsvpStatus }): Promise<Rsvp>;
  findByEventAndUser(tx: Tx, eventId: number, userId: number): Promise<Rsvp | null>;
  updateStatus(tx: Tx, id: number, status: RsvpStatus): Promise<Rsvp>;
  listByEvent(tx: Tx, eventId: number): Promise<Rsvp[]>;
  deleteByEvent(tx: Tx, eventId: number): Promise<void>;
}
