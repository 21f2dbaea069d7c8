import { type Article } from './article';
import { type Comment, type CommentOwner } from './comment';
import { type Group, type Session, type User } from './user';

/** Runs `fn` inside one database transaction, rolling back if it throws. */
export type TransactionRunner = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export interface UserRepository {
  create(
    tx: unknown,
    user: { id: string; passwordHash: string; name: string; email: string; groupId: string },
  ): Promise<User>;
  findById(tx: unknown, id: string): Promise<User | null>;
  findByIds(tx: unknown, ids: readonly string[]): Promise<User[]>;
  count(tx: unknown): Promise<number>;
  /** Serializes sign-ups until `tx` ends, so the empty-installation check cannot race. */
  lockSignups(tx: unknown): Promise<void>;
  updateProfile(tx: unknown, id: string, profile: { name: string; email: string }): Promise<User | null>;
  updatePassword(tx: unknown, id: string, passwordHash: string): Promise<void>;
  delete(tx: unknown, id: string): Promise<void>;
}

export interface GroupRepository {
  findById(tx: unknown, id: string): Promise<Group | null>;
}

export interface SessionRepository {
  create(tx: unknown, session: Session): Promise<void>;
  findById(tx: unknown, id: string): Promise<Session | null>;
  delete(tx: unknown, id: string): Promise<void>;
  deleteAllForUser(tx: unknown, userId: string, exceptId?: string): Promise<void>;
  deleteExpired(tx: unknown): Promise<number>;
}

export interface ArticleRepository {
  create(
    tx: unknown,
    article: { title: string; authorId: string; slug: string; content: string; visible: boolean },
  ): Promise<Article>;
  findById(tx: unknown, id: number): Promise<Article | null>;
  findBySlug(tx: unknown, slug: string): Promise<Article | null>;
  listVisible(tx: unknown, opts: { limit: number; offset: number }): Promise<Article[]>;
  countByAuthor(tx: unknown, authorId: string): Promise<number>;
  update(
    tx: unknown,
    id: number,
    changes: { title: string; slug: string; content: string; visible: boolean },
  ): Promise<Article | null>;
  setVisible(tx: unknown, id: number, visible: boolean): Promise<void>;
  delete(tx: unknown, id: number): Promise<void>;
}

export interface CommentRepository {
  create(
    tx: unknown,
    comment: { parentId: number | null; articleId: number; owner: CommentOwner; content: string },
  ): Promise<Comment>;
  findById(tx: unknown, id: number): Promise<Comment | null>;
  /** Oldest first; ties broken by id. */
  listByArticle(tx: unknown, articleId: number): Promise<Comment[]>;
  /** Newest first. */
  listByAuthor(tx: unknown, userId: string): Promise<Comment[]>;
  countChildren(tx: unknown, id: number): Promise<number>;
  updateContent(tx: unknown, id: number, content: string): Promise<Comment | null>;
  setVisible(tx: unknown, id: number, visible: boolean): Promise<void>;
  delete(tx: unknown, id: number): Promise<void>;
  deleteByArticle(tx: unknown, articleId: number): Promise<number>;
  /** Rewrites a user's comments as guest comments under `name`. */
  convertAuthorToGuest(tx: unknown, userId: string, name: string): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface SessionTokens {
  generate(): string;
  hash(token: string): string;
}

export interface MarkdownRenderer {
  /** Untrusted input: raw HTML is escaped. */
  render(markdown: string): string;
  /** Trusted input: raw HTML passes through. */
  renderTrusted(markdown: string): string;
  escape(text: string): string;
}

export interface CommentRateLimiter {
  checkSubmitRate(actorKey: string, articleId: number): Promise<boolean>;
}
