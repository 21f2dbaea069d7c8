import { type PoolClient } from 'pg';
import { type Session, type SessionRepository } from '@inkwell/domain';

interface SessionRow {
  id: string;
  user: string;
  expires_at: Date;
}

export class PgSessionRepository implements SessionRepository {
  async create(tx: unknown, session: Session): Promise<void> {
    const client = tx as PoolClient;
    await client.query(
      `INSERT INTO sessions (id, "user", expires_at) VALUES ($1, $2, $3)`,
      [session.id, session.userId, session.expiresAt],
    );
  }

  async findById(tx: unknown, id: string): Promise<Session | null> {
    const client = tx as PoolClient;
    const result = await client.query<SessionRow>(
      `SELECT id, "user", expires_at FROM sessions WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? { id: row.id, userId: row.user, expiresAt: row.expires_at } : null;
  }

  async delete(tx: unknown, id: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query('DELETE FROM sessions WHERE id = $1', [id]);
  }

  async deleteAllForUser(tx: unknown, userId: string, exceptId?: string): Promise<void> {
    const client = tx as PoolClient;
    if (exceptId !== undefined) {
      await client.query(`DELETE FROM sessions WHERE "user" = $1 AND id <> $2`, [userId, exceptId]);
      return;
    }
    await client.query(`DELETE FROM sessions WHERE "user" = $1`, [userId]);
  }

  async deleteExpired(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query('DELETE FROM sessions WHERE expires_at <= NOW()');
    return result.rowCount ?? 0;
  }
}
