import { vi } from 'vitest';
import { type AuthContext } from '../authorization';
import { type Article } from '../article';
import { type Comment, type CommentOwner } from '../comment';
import {
  type ArticleRepository,
  type CommentRepository,
  type MarkdownRenderer,
  type TransactionRunner,
} from '../ports';
import { Permission } from '../permissions';
import { type Group, type User } from '../user';

export const ADMIN_GROUP: Group = { id: 'admin', permissions: new Set([Permission.All]) };

export const AUTHOR_GROUP: Group = {
  id: 'author',
  permissions: new Set([
    Permission.CreateArticle,
    Permission.EditArticle,
    Permission.DeleteArticle,
    Permission.CreateComment,
    Permission.EditComment,
    Permission.EditForeignComment,
    Permission.DeleteComment,
    Permission.DeleteForeignComment,
  ]),
};

export const DEFAULT_GROUP: Group = {
  id: 'default',
  permissions: new Set([Permission.CreateComment, Permission.EditComment, Permission.DeleteComment]),
};

export function contextFor(userId: string, group: Group): AuthContext {
  return {
    session: { id: `session-${userId}`, userId, expiresAt: new Date('2100-01-01') },
    group,
  };
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 'alice',
    passwordHash: 'hashed:test-password',
    name: 'Alice',
    email: 'alice@example.com',
    groupId: 'default',
    ...overrides,
  };
}

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    id: 1,
    title: 'First post',
    authorId: 'writer',
    slug: 'first-post',
    content: '# Hello',
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    visible: true,
    ...overrides,
  };
}

export function makeComment(overrides: Partial<Comment> = {}): Comment {
  return {
    id: 1,
    parentId: null,
    articleId: 1,
    owner: { kind: 'user', userId: 'alice' },
    content: 'A comment',
    createdAt: new Date('2026-01-02T00:00:00.000Z'),
    visible: true,
    ...overrides,
  };
}

/** Article repository over an in-memory list, with every method spied. */
export function createArticleStore(initial: Article[] = []) {
  const rows = new Map(initial.map((a) => [a.id, { ...a }]));
  let nextId = Math.max(0, ...rows.keys()) + 1;

  const repo = {
    create: vi.fn(async (_tx: unknown, input: Omit<Article, 'id' | 'createdAt'>) => {
      const article: Article = { ...input, id: nextId++, createdAt: new Date('2026-02-01T00:00:00.000Z') };
      rows.set(article.id, article);
      return { ...article };
    }),
    findById: vi.fn(async (_tx: unknown, id: number) => {
      const row = rows.get(id);
      return row ? { ...row } : null;
    }),
    findBySlug: vi.fn(async (_tx: unknown, slug: string) => {
      const row = [...rows.values()].find((a) => a.slug === slug);
      return row ? { ...row } : null;
    }),
    listVisible: vi.fn(async (_tx: unknown, opts: { limit: number; offset: number }) =>
      [...rows.values()]
        .filter((a) => a.visible)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
        .slice(opts.offset, opts.offset + opts.limit),
    ),
    countByAuthor: vi.fn(
      async (_tx: unknown, authorId: string) => [...rows.values()].filter((a) => a.authorId === authorId).length,
    ),
    update: vi.fn(
      async (
        _tx: unknown,
        id: number,
        changes: { title: string; slug: string; content: string; visible: boolean },
      ) => {
        const row = rows.get(id);
        if (!row) return null;
        Object.assign(row, changes);
        return { ...row };
      },
    ),
    setVisible: vi.fn(async (_tx: unknown, id: number, visible: boolean) => {
      const row = rows.get(id);
      if (row) row.visible = visible;
    }),
    delete: vi.fn(async (_tx: unknown, id: number) => {
      rows.delete(id);
    }),
  } satisfies ArticleRepository;

  return { repo, rows };
}

/** Comment repository over an in-memory list, with every method spied. */
export function createCommentStore(initial: Comment[] = []) {
  const rows = new Map(initial.map((c) => [c.id, { ...c }]));
  let nextId = Math.max(0, ...rows.keys()) + 1;

  const repo = {
    create: vi.fn(
      async (
        _tx: unknown,
        input: { parentId: number | null; articleId: number; owner: CommentOwner; content: string },
      ) => {
        const comment: Comment = {
          ...input,
          id: nextId++,
          createdAt: new Date('2026-02-01T00:00:00.000Z'),
          visible: true,
        };
        rows.set(comment.id, comment);
        return { ...comment };
      },
    ),
    findById: vi.fn(async (_tx: unknown, id: number) => {
      const row = rows.get(id);
      return row ? { ...row } : null;
    }),
    listByArticle: vi.fn(async (_tx: unknown, articleId: number) =>
      [...rows.values()]
        .filter((c) => c.articleId === articleId)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id)
        .map((c) => ({ ...c })),
    ),
    listByAuthor: vi.fn(async (_tx: unknown, userId: string) =>
      [...rows.values()]
        .filter((c) => c.owner.kind === 'user' && c.owner.userId === userId)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
        .map((c) => ({ ...c })),
    ),
    countChildren: vi.fn(
      async (_tx: unknown, id: number) => [...rows.values()].filter((c) => c.parentId === id).length,
    ),
    updateContent: vi.fn(async (_tx: unknown, id: number, content: string) => {
      const row = rows.get(id);
      if (!row) return null;
      row.content = content;
      return { ...row };
    }),
    setVisible: vi.fn(async (_tx: unknown, id: number, visible: boolean) => {
      const row = rows.get(id);
      if (row) row.visible = visible;
    }),
    delete: vi.fn(async (_tx: unknown, id: number) => {
      rows.delete(id);
    }),
    deleteByArticle: vi.fn(async (_tx: unknown, articleId: number) => {
      let removed = 0;
      for (const [id, row] of rows) {
        if (row.articleId === articleId) {
          rows.delete(id);
          removed++;
        }
      }
      return removed;
    }),
    convertAuthorToGuest: vi.fn(async (_tx: unknown, userId: string, name: string) => {
      let converted = 0;
      for (const row of rows.values()) {
        if (row.owner.kind === 'user' && row.owner.userId === userId) {
          row.owner = { kind: 'guest', name };
          converted++;
        }
      }
      return converted;
    }),
  } satisfies CommentRepository;

  return { repo, rows };
}

export const fakeMarkdown: MarkdownRenderer = {
  render: (markdown) => `<p>${fakeEscape(markdown)}</p>`,
  renderTrusted: (markdown) => `<p>${markdown}</p>`,
  escape: (text) => fakeEscape(text),
};

function fakeEscape(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** Runs work inline on a dummy handle and records each transaction. */
export function createTransactionRunner() {
  const calls = vi.fn();
  const run: TransactionRunner = (fn) => {
    calls();
    return fn({});
  };
  return { run, calls };
}
