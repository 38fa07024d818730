import { type PoolClient } from 'pg';
import { type Rsvp, type RsvpStatus, type RsvpRepository, isRsvpStatus } from '@soiree/domain';

interface RsvpRow {
  id: number;
  event_id: number;
  user_id: number;
  status: string;
}

const RSVP_COLUMNS = 'id, event_id, user_id, status';

export class PgRsvpRepository implements RsvpRepository<PoolClient> {
  async create(
    client: PoolClient,
    rsvp: { eventId: number; userId: number; status: RsvpStatus },
  ): Promise<Rsvp> {
    const result = await client.query<RsvpRow>(
      `INSERT INTO rsvps (event_id, user_id, status)
       VALUES ($1, $2, $3)
       RETURNING ${RSVP_COLUMNS}`,
      [rsvp.eventId, rsvp.userId, rsvp.status],
    );
    return mapRsvpRow(result.rows[0]);
  }

  async findByEventAndUser(client: PoolClient, eventId: number, userId: number): Promise<Rsvp | null> {
    const result = await client.query<RsvpRow>(
      `SELECT ${RSVP_COLUMNS} FROM rsvps WHERE event_id = $1 AND user_id = $2`,
      [eventId, userId],
    );
    return result.rows[0] ? mapRsvpRow(result.rows[0]) : null;
  }

  async updateStatus(client: PoolClient, id: number, status: RsvpStatus): Promise<Rsvp> {
    const result = await client.query<RsvpRow>(
      `UPDATE rsvps SET status = $2 WHERE id = $1 RETURNING ${RSVP_COLUMNS}`,
      [id, status],
    );
    return mapRsvpRow(result.rows[0]);
  }

  async listByEvent(client: PoolClient, eventId: number): Promise<Rsvp[]> {
    const result = await client.query<RsvpRow>(
      `SELECT ${RSVP_COLUMNS} FROM rsvps WHERE event_id = $1 ORDER BY id ASC`,
      [eventId],
    );
    return result.rows.map(mapRsvpRow);
  }

  async deleteByEvent(client: PoolClient, eventId: number): Promise<void> {
    await client.query(`DELETE FROM rsvps WHERE event_id = $1`, [eventId]);
  }
}

function mapRsvpRow(row: RsvpRow): Rsvp {
  if (!isRsvpStatus(row.status)) {
    throw new Error(`Unknown RSVP status '${row.status}' on rsvp ${row.id}`);
  }
  return {
    id: row.id,
    eventId: row.event_id,
    userId: row.user_id,
    status: row.status,
  };
}
