import { describe, it, expect, beforeEach } from 'vitest';
import { ArticleService, ArticleError } from '../article-service';
import { ANONYMOUS_CONTEXT, DEFAULT_GATE_POLICY } from '../authorization';
import { Permission } from '../permissions';
import {
  ADMIN_GROUP,
  AUTHOR_GROUP,
  DEFAULT_GROUP,
  contextFor,
  createArticleStore,
  createCommentStore,
  fakeMarkdown,
  makeArticle,
  makeComment,
  createTransactionRunner,
} from './fixtures';

const WRITER = contextFor('writer', AUTHOR_GROUP);
const OTHER_WRITER = contextFor('other', AUTHOR_GROUP);
const ADMIN = contextFor('root', ADMIN_GROUP);
const READER = contextFor('alice', DEFAULT_GROUP);
const COPY_EDITOR = contextFor('editor', {
  id: 'copy-editor',
  permissions: new Set([Permission.EditForeignArticle]),
});

const INPUT = { title: 'Second post', slug: 'second-post', content: 'Body', visible: true };

function setup() {
  const articles = createArticleStore([
    makeArticle({ id: 1, slug: 'first-post', authorId: 'writer' }),
    makeArticle({ id: 2, slug: 'draft', authorId: 'writer', visible: false, content: 'wip' }),
  ]);
  const comments = createCommentStore([
    makeComment({ id: 1, articleId: 1 }),
    makeComment({ id: 2, articleId: 1, parentId: 1 }),
    makeComment({ id: 3, articleId: 2 }),
  ]);
  const transactions = createTransactionRunner();
  const service = new ArticleService({
    articleRepo: articles.repo,
    commentRepo: comments.repo,
    markdown: fakeMarkdown,
    withTransaction: transactions.run,
    policy: DEFAULT_GATE_POLICY,
  });
  return { articles, comments, service, transactions };
}

describe('ArticleService', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  describe('list', () => {
    it('pages through published articles ten at a time', async () => {
      const many = createArticleStore(
        Array.from({ length: 12 }, (_, i) =>
          makeArticle({ id: i + 1, slug: `post-${i + 1}`, createdAt: new Date(Date.UTC(2026, 0, i + 1)) }),
        ),
      );
      const service = new ArticleService({
        articleRepo: many.repo,
        commentRepo: createCommentStore().repo,
        markdown: fakeMarkdown,
        withTransaction: createTransactionRunner().run,
        policy: DEFAULT_GATE_POLICY,
      });

      const first = await service.list(1);
      const second = await service.list(2);

      expect(first.map((a) => a.id)).toEqual([12, 11, 10, 9, 8, 7, 6, 5, 4, 3]);
      expect(second.map((a) => a.id)).toEqual([2, 1]);
      expect(many.repo.listVisible).toHaveBeenLastCalledWith({}, { limit: 10, offset: 10 });
    });

    it('treats pages below one as the first page', async () => {
      await ctx.service.list(0);
      expect(ctx.articles.repo.listVisible).toHaveBeenCalledWith({}, { limit: 10, offset: 0 });
    });

    it('leaves out unpublished articles', async () => {
      const articles = await ctx.service.list(1);
      expect(articles.map((a) => a.id)).toEqual([1]);
    });
  });

  describe('get', () => {
    it('finds an article by slug and renders its body', async () => {
      const article = await ctx.service.get(ANONYMOUS_CONTEXT, 'first-post');
      expect(article).toMatchObject({
        id: 1,
        html: '<p># Hello</p>',
        canEdit: false,
        canDelete: false,
      });
    });

    it('finds an article by numeric id', async () => {
      const article = await ctx.service.get(WRITER, '1');
      expect(article).toMatchObject({ slug: 'first-post', canEdit: true, canDelete: true });
    });

    it('answers out-of-range ids as not found without querying', async () => {
      await expect(ctx.service.get(READER, '12345678901')).rejects.toMatchObject({
        kind: 'NOT_FOUND',
        message: 'Article not found',
      });
      expect(ctx.articles.repo.findById).not.toHaveBeenCalled();
      expect(ctx.articles.repo.findBySlug).not.toHaveBeenCalled();
    });

    it('hides unpublished articles from readers', async () => {
      await expect(ctx.service.get(READER, 'draft')).rejects.toMatchObject({
        kind: 'NOT_FOUND',
        message: 'Article not found',
      });
      await expect(ctx.service.get(OTHER_WRITER, '2')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });

    it('shows unpublished articles to their author and administrators', async () => {
      expect((await ctx.service.get(WRITER, 'draft')).content).toBe('wip');
      expect((await ctx.service.get(ADMIN, 'draft')).content).toBe('wip');
    });
  });

  describe('create', () => {
    it('stores the article under the caller', async () => {
      const article = await ctx.service.create(WRITER, INPUT);
      expect(article).toMatchObject({ id: 3, authorId: 'writer', slug: 'second-post', html: '<p>Body</p>' });
    });

    it('requires CreateArticle', async () => {
      await expect(ctx.service.create(READER, INPUT)).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      await expect(ctx.service.create(ANONYMOUS_CONTEXT, INPUT)).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
      expect(ctx.articles.repo.create).not.toHaveBeenCalled();
    });

    it('rejects illegal slug characters', async () => {
      await expect(ctx.service.create(WRITER, { ...INPUT, slug: 'second post' })).rejects.toMatchObject({
        kind: 'VALIDATION',
        message: "Illegal character ' ' in article URL",
      });
      await expect(ctx.service.create(WRITER, { ...INPUT, slug: 'a/b' })).rejects.toThrow(ArticleError);
    });

    it('rejects all-digit slugs', async () => {
      await expect(ctx.service.create(WRITER, { ...INPUT, slug: '2026' })).rejects.toMatchObject({
        kind: 'VALIDATION',
        message: 'Article URL must contain a non-digit character',
      });
    });

    it('rejects a slug already in use', async () => {
      await expect(ctx.service.create(WRITER, { ...INPUT, slug: 'draft' })).rejects.toMatchObject({
        kind: 'CONFLICT',
      });
    });
  });

  describe('edit', () => {
    it('lets the author change their article', async () => {
      const article = await ctx.service.edit(WRITER, 1, { ...INPUT, slug: 'first-post' });
      expect(article).toMatchObject({ id: 1, title: 'Second post', slug: 'first-post' });
    });

    it('rejects editing a foreign article without EditForeignArticle', async () => {
      await expect(ctx.service.edit(OTHER_WRITER, 1, INPUT)).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      expect(ctx.articles.repo.update).not.toHaveBeenCalled();
    });

    it('requires delete rights to hide an article through an edit', async () => {
      await expect(
        ctx.service.edit(COPY_EDITOR, 1, { ...INPUT, slug: 'first-post', visible: false }),
      ).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      expect(ctx.articles.repo.update).not.toHaveBeenCalled();
      expect(ctx.articles.rows.get(1)?.visible).toBe(true);
    });

    it('requires delete rights to republish an article through an edit', async () => {
      await expect(
        ctx.service.edit(COPY_EDITOR, 2, { ...INPUT, slug: 'draft', visible: true }),
      ).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      expect(ctx.articles.rows.get(2)?.visible).toBe(false);
    });

    it('keeps the stored visibility when the edit leaves it out', async () => {
      const article = await ctx.service.edit(COPY_EDITOR, 2, {
        title: 'Still a draft',
        slug: 'draft',
        content: 'more wip',
      });

      expect(article).toMatchObject({ id: 2, title: 'Still a draft', visible: false });
      expect(ctx.articles.repo.update).toHaveBeenCalledWith({}, 2, {
        title: 'Still a draft',
        slug: 'draft',
        content: 'more wip',
        visible: false,
      });
    });

    it('lets the author hide their own article while editing', async () => {
      const article = await ctx.service.edit(WRITER, 1, { ...INPUT, slug: 'first-post', visible: false });
      expect(article.visible).toBe(false);
    });

    it('publishes new articles unless asked otherwise', async () => {
      const article = await ctx.service.create(WRITER, { title: 'Third', slug: 'third', content: 'x' });
      expect(article.visible).toBe(true);
    });

    it('rejects taking another article slug', async () => {
      await expect(ctx.service.edit(WRITER, 1, { ...INPUT, slug: 'draft' })).rejects.toMatchObject({
        kind: 'CONFLICT',
      });
    });
  });

  describe('lifecycle', () => {
    it('restores a removed article with its content intact', async () => {
      const removed = await ctx.service.remove(WRITER, 1);
      expect(removed.visible).toBe(false);
      await expect(ctx.service.get(READER, '1')).rejects.toMatchObject({ kind: 'NOT_FOUND' });

      const restored = await ctx.service.restore(WRITER, 1);
      expect(restored).toMatchObject({ visible: true, content: '# Hello', title: 'First post' });
    });

    it('rejects removing twice and restoring a visible article', async () => {
      await ctx.service.remove(WRITER, 1);
      await expect(ctx.service.remove(WRITER, 1)).rejects.toMatchObject({ kind: 'CONFLICT' });
      await expect(ctx.service.restore(WRITER, 2)).resolves.toMatchObject({ visible: true });
      await expect(ctx.service.restore(WRITER, 2)).rejects.toMatchObject({ kind: 'CONFLICT' });
    });

    it('reserves purging for DeleteForeignArticle', async () => {
      await expect(ctx.service.purge(WRITER, 1)).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      expect(ctx.articles.rows.has(1)).toBe(true);
    });

    it('purges the article together with its comments', async () => {
      await ctx.service.purge(ADMIN, 1);

      expect(ctx.articles.rows.has(1)).toBe(false);
      expect([...ctx.comments.rows.keys()]).toEqual([3]);
      expect(ctx.transactions.calls).toHaveBeenCalledOnce();
    });

    it('reports a purged article as not found', async () => {
      await ctx.service.purge(ADMIN, 1);
      await expect(ctx.service.restore(ADMIN, 1)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });
  });
});
