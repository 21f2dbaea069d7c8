import { type PoolClient } from 'pg';
import { type Group, type GroupRepository, parsePermissions } from '@inkwell/domain';

export class PgGroupRepository implements GroupRepository {
  async findById(tx: unknown, id: string): Promise<Group | null> {
    const client = tx as PoolClient;
    // enum arrays have no registered parser; cast to text[] so pg returns string[]
    const result = await client.query<{ id: string; permissions: string[] }>(
      'SELECT id, permissions::text[] AS permissions FROM groups WHERE id = $1',
      [id],
    );
    const row = result.rows[0];
    if (!row) return null;
    return { id: row.id, permissions: parsePermissions(row.permissions) };
  }
}
