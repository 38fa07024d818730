import { type PoolClient } from 'pg';
import { type User, type UserRepository } from '@soiree/domain';

interface UserRow {
  id: number;
  username: string;
  email: string;
  hashed_password: string;
}

const USER_COLUMNS = 'id, username, email, hashed_password';

export class PgUserRepository implements UserRepository<PoolClient> {
  async create(
    client: PoolClient,
    user: { username: string; email: string; passwordHash: string },
  ): Promise<User | null> {
    // a conflict on either unique column inserts nothing and returns no row
    const result = await client.query<UserRow>(
      `INSERT INTO users (username, email, hashed_password)
       VALUES ($1, $2, $3)
       ON CONFLICT DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [user.username, user.email, user.passwordHash],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsername(client: PoolClient, username: string): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsernameOrEmail(client: PoolClient, username: string, email: string): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users
       WHERE username = $1 OR email = $2
       LIMIT 1`,
      [username, email],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findById(client: PoolClient, id: number): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.hashed_password,
  };
}
