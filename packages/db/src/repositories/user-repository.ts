import { type PoolClient } from 'pg';
import { type User, type UserRepository } from '@inkwell/domain';

const USER_COLUMNS = 'id, password_hash, name, email, "group"';

// advisory lock key held by sign-up transactions
const SIGNUP_LOCK_KEY = 0x696e6b77;

interface UserRow {
  id: string;
  password_hash: string;
  name: string;
  email: string;
  group: string;
}

export class PgUserRepository implements UserRepository {
  async create(
    tx: unknown,
    user: { id: string; passwordHash: string; name: string; email: string; groupId: string },
  ): Promise<User> {
    const client = tx as PoolClient;
    const result = await client.query<UserRow>(
      `INSERT INTO users (id, password_hash, name, email, "group")
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.passwordHash, user.name, user.email, user.groupId],
    );
    return mapUserRow(result.rows[0]);
  }

  async lockSignups(tx: unknown): Promise<void> {
    const client = tx as PoolClient;
    await client.query('SELECT pg_advisory_xact_lock($1)', [SIGNUP_LOCK_KEY]);
  }

  async findById(tx: unknown, id: string): Promise<User | null> {
    const client = tx as PoolClient;
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByIds(tx: unknown, ids: readonly string[]): Promise<User[]> {
    if (ids.length === 0) return [];
    const client = tx as PoolClient;
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = ANY($1::varchar[])`,
      [ids],
    );
    return result.rows.map(mapUserRow);
  }

  async count(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query<{ count: string }>('SELECT COUNT(*) AS count FROM users');
    return Number(result.rows[0]?.count ?? 0);
  }

  async updateProfile(
    tx: unknown,
    id: string,
    profile: { name: string; email: string },
  ): Promise<User | null> {
    const client = tx as PoolClient;
    const result = await client.query<UserRow>(
      `UPDATE users SET name = $2, email = $3
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [id, profile.name, profile.email],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async updatePassword(tx: unknown, id: string, passwordHash: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query('UPDATE users SET password_hash = $2 WHERE id = $1', [id, passwordHash]);
  }

  async delete(tx: unknown, id: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query('DELETE FROM users WHERE id = $1', [id]);
  }
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    passwordHash: row.password_hash,
    name: row.name,
    email: row.email,
    groupId: row.group,
  };
}
