import { type PoolClient } from 'pg';
import { type Article, type ArticleRepository } from '@inkwell/domain';

const ARTICLE_COLUMNS = 'id, title, author, slug, content, created_at, visible';

interface ArticleRow {
  id: number;
  title: string;
  author: string;
  slug: string;
  content: string;
  created_at: Date;
  visible: boolean;
}

export class PgArticleRepository implements ArticleRepository {
  async create(
    tx: unknown,
    article: { title: string; authorId: string; slug: string; content: string; visible: boolean },
  ): Promise<Article> {
    const client = tx as PoolClient;
    const result = await client.query<ArticleRow>(
      `INSERT INTO articles (title, author, slug, content, visible)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${ARTICLE_COLUMNS}`,
      [article.title, article.authorId, article.slug, article.content, article.visible],
    );
    return mapArticleRow(result.rows[0]);
  }

  async findById(tx: unknown, id: number): Promise<Article | null> {
    const client = tx as PoolClient;
    const result = await client.query<ArticleRow>(
      `SELECT ${ARTICLE_COLUMNS} FROM articles WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapArticleRow(result.rows[0]) : null;
  }

  async findBySlug(tx: unknown, slug: string): Promise<Article | null> {
    const client = tx as PoolClient;
    const result = await client.query<ArticleRow>(
      `SELECT ${ARTICLE_COLUMNS} FROM articles WHERE slug = $1`,
      [slug],
    );
    return result.rows[0] ? mapArticleRow(result.rows[0]) : null;
  }

  async listVisible(tx: unknown, opts: { limit: number; offset: number }): Promise<Article[]> {
    const client = tx as PoolClient;
    const result = await client.query<ArticleRow>(
      `SELECT ${ARTICLE_COLUMNS}
       FROM articles
       WHERE visible
       ORDER BY created_at DESC, id DESC
       LIMIT $1 OFFSET $2`,
      [opts.limit, opts.offset],
    );
    return result.rows.map(mapArticleRow);
  }

  async countByAuthor(tx: unknown, authorId: string): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM articles WHERE author = $1',
      [authorId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async update(
    tx: unknown,
    id: number,
    changes: { title: string; slug: string; content: string; visible: boolean },
  ): Promise<Article | null> {
    const client = tx as PoolClient;
    const result = await client.query<ArticleRow>(
      `UPDATE articles SET title = $2, slug = $3, content = $4, visible = $5
       WHERE id = $1
       RETURNING ${ARTICLE_COLUMNS}`,
      [id, changes.title, changes.slug, changes.content, changes.visible],
    );
    return result.rows[0] ? mapArticleRow(result.rows[0]) : null;
  }

  async setVisible(tx: unknown, id: number, visible: boolean): Promise<void> {
    const client = tx as PoolClient;
    await client.query('UPDATE articles SET visible = $2 WHERE id = $1', [id, visible]);
  }

  async delete(tx: unknown, id: number): Promise<void> {
    const client = tx as PoolClient;
    await client.query('DELETE FROM articles WHERE id = $1', [id]);
  }
}

function mapArticleRow(row: ArticleRow): Article {
  return {
    id: row.id,
    title: row.title,
    authorId: row.author,
    slug: row.slug,
    content: row.content,
    createdAt: row.created_at,
    visible: row.visible,
  };
}
