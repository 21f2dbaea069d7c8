import { type AuthContext, type GatePolicy, isAuthorized } from './authorization';
import { type ArticleRepository } from './ports';

export interface Article {
  id: number;
  title: string;
  authorId: string;
  slug: string;
  content: string;
  createdAt: Date;
  visible: boolean;
}

export const ARTICLES_PER_PAGE = 10;

/** Largest value of a SERIAL column. */
export const MAX_RECORD_ID = 2_147_483_647;

const ILLEGAL_SLUG_CHARS = new Set('^"&,@#$%+*:?;<>[]`{}/\\');

/** Returns the first character that may not appear in a slug, if any. */
export function findIllegalSlugChar(slug: string): string | null {
  for (const char of slug) {
    if (ILLEGAL_SLUG_CHARS.has(char) || /\s/.test(char)) return char;
  }
  return null;
}

/**
 * Numeric path segments address articles by id, anything else by slug. Ids
 * past the id range cannot name any article and yield `null`.
 */
export function parseArticleRef(ref: string): { id: number } | { slug: string } | null {
  if (!/^\d+$/.test(ref)) return { slug: ref };
  const id = Number(ref);
  return id <= MAX_RECORD_ID ? { id } : null;
}

export async function findArticleByRef(
  repo: ArticleRepository,
  tx: unknown,
  ref: string,
): Promise<Article | null> {
  const parsed = parseArticleRef(ref);
  if (parsed === null) return null;
  return 'id' in parsed ? repo.findById(tx, parsed.id) : repo.findBySlug(tx, parsed.slug);
}

/** Unpublished articles are readable by whoever may edit or delete them. */
export function canReadArticle(ctx: AuthContext, article: Article, policy?: GatePolicy): boolean {
  return (
    article.visible ||
    isAuthorized(ctx, 'article:edit', article.authorId, policy) ||
    isAuthorized(ctx, 'article:delete', article.authorId, policy)
  );
}
