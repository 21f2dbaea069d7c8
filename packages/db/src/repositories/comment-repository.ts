import { type PoolClient } from 'pg';
import {
  type Comment,
  type CommentOwner,
  type CommentRepository,
  createCommentOwner,
} from '@inkwell/domain';

const COMMENT_COLUMNS = 'id, parent, article, author, name, content, created_at, visible';

interface CommentRow {
  id: number;
  parent: number | null;
  article: number;
  author: string | null;
  name: string | null;
  content: string;
  created_at: Date;
  visible: boolean;
}

export class PgCommentRepository implements CommentRepository {
  async create(
    tx: unknown,
    comment: { parentId: number | null; articleId: number; owner: CommentOwner; content: string },
  ): Promise<Comment> {
    const client = tx as PoolClient;
    const { author, name } = ownerColumns(comment.owner);
    const result = await client.query<CommentRow>(
      `INSERT INTO comments (parent, article, author, name, content, visible)
       VALUES ($1, $2, $3, $4, $5, TRUE)
       RETURNING ${COMMENT_COLUMNS}`,
      [comment.parentId, comment.articleId, author, name, comment.content],
    );
    return mapCommentRow(result.rows[0]);
  }

  async findById(tx: unknown, id: number): Promise<Comment | null> {
    const client = tx as PoolClient;
    const result = await client.query<CommentRow>(
      `SELECT ${COMMENT_COLUMNS} FROM comments WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapCommentRow(result.rows[0]) : null;
  }

  async listByArticle(tx: unknown, articleId: number): Promise<Comment[]> {
    const client = tx as PoolClient;
    const result = await client.query<CommentRow>(
      `SELECT ${COMMENT_COLUMNS}
       FROM comments
       WHERE article = $1
       ORDER BY created_at ASC, id ASC`,
      [articleId],
    );
    return result.rows.map(mapCommentRow);
  }

  async listByAuthor(tx: unknown, userId: string): Promise<Comment[]> {
    const client = tx as PoolClient;
    const result = await client.query<CommentRow>(
      `SELECT ${COMMENT_COLUMNS}
       FROM comments
       WHERE author = $1
       ORDER BY created_at DESC, id DESC`,
      [userId],
    );
    return result.rows.map(mapCommentRow);
  }

  async countChildren(tx: unknown, id: number): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM comments WHERE parent = $1',
      [id],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async updateContent(tx: unknown, id: number, content: string): Promise<Comment | null> {
    const client = tx as PoolClient;
    const result = await client.query<CommentRow>(
      `UPDATE comments SET content = $2 WHERE id = $1 RETURNING ${COMMENT_COLUMNS}`,
      [id, content],
    );
    return result.rows[0] ? mapCommentRow(result.rows[0]) : null;
  }

  async setVisible(tx: unknown, id: number, visible: boolean): Promise<void> {
    const client = tx as PoolClient;
    await client.query('UPDATE comments SET visible = $2 WHERE id = $1', [id, visible]);
  }

  async delete(tx: unknown, id: number): Promise<void> {
    const client = tx as PoolClient;
    await client.query('DELETE FROM comments WHERE id = $1', [id]);
  }

  async deleteByArticle(tx: unknown, articleId: number): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query('DELETE FROM comments WHERE article = $1', [articleId]);
    return result.rowCount ?? 0;
  }

  async convertAuthorToGuest(tx: unknown, userId: string, name: string): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query(
      'UPDATE comments SET author = NULL, name = $2 WHERE author = $1',
      [userId, name],
    );
    return result.rowCount ?? 0;
  }
}

function ownerColumns(owner: CommentOwner): { author: string | null; name: string | null } {
  return owner.kind === 'user'
    ? { author: owner.userId, name: null }
    : { author: null, name: owner.name };
}

function mapCommentRow(row: CommentRow): Comment {
  return {
    id: row.id,
    parentId: row.parent,
    articleId: row.article,
    owner: createCommentOwner(row.author, row.name),
    content: row.content,
    createdAt: row.created_at,
    visible: row.visible,
  };
}
