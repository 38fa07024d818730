import { type PoolClient } from 'pg';
import { type PartyEvent, type NewPartyEvent, type Page, type EventRepository } from '@soiree/domain';

interface EventRow {
  id: number;
  title: string;
  description: string | null;
  date: Date;
  location: string;
  owner_id: number;
}

const EVENT_COLUMNS = 'id, title, description, date, location, owner_id';

export class PgEventRepository implements EventRepository<PoolClient> {
  async create(client: PoolClient, event: NewPartyEvent & { ownerId: number }): Promise<PartyEvent> {
    const result = await client.query<EventRow>(
      `INSERT INTO events (title, description, date, location, owner_id)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${EVENT_COLUMNS}`,
      [event.title, event.description, event.date, event.location, event.ownerId],
    );
    return mapEventRow(result.rows[0]);
  }

  async findById(client: PoolClient, id: number): Promise<PartyEvent | null> {
    const result = await client.query<EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM events WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapEventRow(result.rows[0]) : null;
  }

  async findOwned(client: PoolClient, id: number, ownerId: number): Promise<PartyEvent | null> {
    const result = await client.query<EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM events WHERE id = $1 AND owner_id = $2`,
      [id, ownerId],
    );
    return result.rows[0] ? mapEventRow(result.rows[0]) : null;
  }

  async listByOwner(client: PoolClient, ownerId: number, page: Page): Promise<PartyEvent[]> {
    const result = await client.query<EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM events
       WHERE owner_id = $1
       ORDER BY id ASC
       OFFSET $2 LIMIT $3`,
      [ownerId, page.skip, page.limit],
    );
    return result.rows.map(mapEventRow);
  }

  async update(client: PoolClient, event: PartyEvent): Promise<PartyEvent> {
    const result = await client.query<EventRow>(
      `UPDATE events
       SET title = $2, description = $3, date = $4, location = $5
       WHERE id = $1
       RETURNING ${EVENT_COLUMNS}`,
      [event.id, event.title, event.description, event.date, event.location],
    );
    return mapEventRow(result.rows[0]);
  }

  async delete(client: PoolClient, id: number): Promise<void> {
    await client.query(`DELETE FROM events WHERE id = $1`, [id]);
  }
}

function mapEventRow(row: EventRow): PartyEvent {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    date: row.date,
    location: row.location,
    ownerId: row.owner_id,
  };
}
