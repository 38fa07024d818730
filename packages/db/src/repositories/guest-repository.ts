import { type PoolClient } from 'pg';
import { type Guest, type GuestRepository } from '@soiree/domain';

interface GuestRow {
  id: number;
  event_id: number;
  name: string;
  email: string;
  invited_by_user_id: number | null;
  responded: boolean;
}

const GUEST_COLUMNS = 'id, event_id, name, email, invited_by_user_id, responded';

export class PgGuestRepository implements GuestRepository<PoolClient> {
  async create(
    client: PoolClient,
    guest: { eventId: number; name: string; email: string; invitedByUserId: number },
  ): Promise<Guest> {
    const result = await client.query<GuestRow>(
      `INSERT INTO guests (event_id, name, email, invited_by_user_id, responded)
       VALUES ($1, $2, $3, $4, FALSE)
       RETURNING ${GUEST_COLUMNS}`,
      [guest.eventId, guest.name, guest.email, guest.invitedByUserId],
    );
    return mapGuestRow(result.rows[0]);
  }

  async findById(client: PoolClient, id: number): Promise<Guest | null> {
    const result = await client.query<GuestRow>(
      `SELECT ${GUEST_COLUMNS} FROM guests WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapGuestRow(result.rows[0]) : null;
  }

  async findByEventAndEmail(client: PoolClient, eventId: number, email: string): Promise<Guest | null> {
    const result = await client.query<GuestRow>(
      `SELECT ${GUEST_COLUMNS} FROM guests
       WHERE event_id = $1 AND email = $2
       ORDER BY id ASC
       LIMIT 1`,
      [eventId, email],
    );
    return result.rows[0] ? mapGuestRow(result.rows[0]) : null;
  }

  async listByEvent(client: PoolClient, eventId: number): Promise<Guest[]> {
    const result = await client.query<GuestRow>(
      `SELECT ${GUEST_COLUMNS} FROM guests WHERE event_id = $1 ORDER BY id ASC`,
      [eventId],
    );
    return result.rows.map(mapGuestRow);
  }

  async markResponded(client: PoolClient, id: number): Promise<void> {
    await client.query(`UPDATE guests SET responded = TRUE WHERE id = $1`, [id]);
  }

  async delete(client: PoolClient, id: number): Promise<void> {
    await client.query(`DELETE FROM guests WHERE id = $1`, [id]);
  }

  async deleteByEvent(client: PoolClient, eventId: number): Promise<void> {
    await client.query(`DELETE FROM guests WHERE event_id = $1`, [eventId]);
  }
}

function mapGuestRow(row: GuestRow): Guest {
  return {
    id: row.id,
    eventId: row.event_id,
    name: row.name,
    email: row.email,
    invitedByUserId: row.invited_by_user_id,
    responded: row.responded,
  };
}
