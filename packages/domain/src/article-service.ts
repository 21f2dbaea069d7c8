import {
  type Article,
  ARTICLES_PER_PAGE,
  canReadArticle,
  findArticleByRef,
  findIllegalSlugChar,
} from './article';
import { type AuthContext, type GatePolicy, isAuthorized } from './authorization';
import {
  type ContentState,
  type LifecycleTransition,
  LifecycleError,
  nextState,
  stateOf,
  transitionAction,
} from './lifecycle';
import {
  type ArticleRepository,
  type CommentRepository,
  type MarkdownRenderer,
  type TransactionRunner,
} from './ports';

export interface ArticleServiceDeps {
  articleRepo: ArticleRepository;
  commentRepo: CommentRepository;
  markdown: MarkdownRenderer;
  withTransaction: TransactionRunner;
  policy: GatePolicy;
}

export interface ArticleView extends Article {
  html: string;
  canEdit: boolean;
  canDelete: boolean;
}

export interface ArticleInput {
  title: string;
  slug: string;
  content: string;
  /** New articles default to published; edits keep the stored flag when absent. */
  visible?: boolean;
}

export class ArticleService {
  constructor(private readonly deps: ArticleServiceDeps) {}

  /** Published articles, newest first. Pages start at 1. */
  async list(page: number): Promise<Article[]> {
    const limit = ARTICLES_PER_PAGE;
    const offset = (Math.max(page, 1) - 1) * limit;
    return this.deps.withTransaction((tx) => this.deps.articleRepo.listVisible(tx, { limit, offset }));
  }

  async get(ctx: AuthContext, ref: string): Promise<ArticleView> {
    return this.deps.withTransaction(async (tx) => {
      const article = await this.findViewable(tx, ctx, ref);
      return this.toView(ctx, article);
    });
  }

  async create(ctx: AuthContext, input: ArticleInput): Promise<ArticleView> {
    const { articleRepo, policy } = this.deps;
    assertValidSlug(input.slug);

    const authorId = ctx.session?.userId;
    if (authorId === undefined || !isAuthorized(ctx, 'article:create', null, policy)) {
      throw new ArticleError('FORBIDDEN', 'Not allowed to create articles');
    }

    return this.deps.withTransaction(async (tx) => {
      if (await articleRepo.findBySlug(tx, input.slug)) {
        throw new ArticleError('CONFLICT', 'An article with this URL already exists');
      }
      const article = await articleRepo.create(tx, {
        title: input.title,
        authorId,
        slug: input.slug,
        content: input.content,
        visible: input.visible ?? true,
      });
      return this.toView(ctx, article);
    });
  }

  async edit(ctx: AuthContext, id: number, changes: ArticleInput): Promise<ArticleView> {
    const { articleRepo, policy } = this.deps;
    assertValidSlug(changes.slug);

    return this.deps.withTransaction(async (tx) => {
      const article = await this.findViewable(tx, ctx, String(id));
      if (!isAuthorized(ctx, 'article:edit', article.authorId, policy)) {
        throw new ArticleError('FORBIDDEN', 'Not allowed to edit this article');
      }

      // hiding or republishing through an edit is a remove/restore
      const visible = changes.visible ?? article.visible;
      if (visible !== article.visible && !isAuthorized(ctx, 'article:delete', article.authorId, policy)) {
        throw new ArticleError('FORBIDDEN', 'Not allowed to change this article');
      }

      if (changes.slug !== article.slug) {
        const taken = await articleRepo.findBySlug(tx, changes.slug);
        if (taken && taken.id !== article.id) {
          throw new ArticleError('CONFLICT', 'An article with this URL already exists');
        }
      }

      const updated = await articleRepo.update(tx, article.id, {
        title: changes.title,
        slug: changes.slug,
        content: changes.content,
        visible,
      });
      if (!updated) {
        throw new ArticleError('NOT_FOUND', 'Article not found');
      }
      return this.toView(ctx, updated);
    });
  }

  async remove(ctx: AuthContext, id: number): Promise<ArticleView> {
    return this.transition(ctx, id, 'remove');
  }

  async restore(ctx: AuthContext, id: number): Promise<ArticleView> {
    return this.transition(ctx, id, 'restore');
  }

  /** Deletes the article and every comment under it. */
  async purge(ctx: AuthContext, id: number): Promise<void> {
    await this.transition(ctx, id, 'purge');
  }

  private async transition(
    ctx: AuthContext,
    id: number,
    transition: LifecycleTransition,
  ): Promise<ArticleView> {
    const { articleRepo, commentRepo, policy } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const article = await this.findViewable(tx, ctx, String(id));
      if (!isAuthorized(ctx, transitionAction('article', transition), article.authorId, policy)) {
        throw new ArticleError('FORBIDDEN', 'Not allowed to change this article');
      }

      const target = applyTransition(stateOf(article), transition);
      if (target === 'purged') {
        await commentRepo.deleteByArticle(tx, article.id);
        await articleRepo.delete(tx, article.id);
      } else {
        await articleRepo.setVisible(tx, article.id, target === 'visible');
      }

      return this.toView(ctx, { ...article, visible: target === 'visible' });
    });
  }

  /**
   * Looks an article up by id or slug. Unpublished articles are NOT_FOUND for
   * callers who could neither edit nor delete them.
   */
  private async findViewable(tx: unknown, ctx: AuthContext, ref: string): Promise<Article> {
    const { articleRepo, policy } = this.deps;
    const article = await findArticleByRef(articleRepo, tx, ref);
    if (!article || !canReadArticle(ctx, article, policy)) {
      throw new ArticleError('NOT_FOUND', 'Article not found');
    }
    return article;
  }

  private toView(ctx: AuthContext, article: Article): ArticleView {
    const { markdown, policy } = this.deps;
    return {
      ...article,
      html: markdown.renderTrusted(article.content),
      canEdit: isAuthorized(ctx, 'article:edit', article.authorId, policy),
      canDelete: isAuthorized(ctx, 'article:delete', article.authorId, policy),
    };
  }
}

function assertValidSlug(slug: string): void {
  const illegal = findIllegalSlugChar(slug);
  if (illegal !== null) {
    throw new ArticleError('VALIDATION', `Illegal character '${illegal}' in article URL`);
  }
  // numeric references always address articles by id
  if (/^\d+$/.test(slug)) {
    throw new ArticleError('VALIDATION', 'Article URL must contain a non-digit character');
  }
}

function applyTransition(state: ContentState, transition: LifecycleTransition): ContentState {
  try {
    return nextState(state, transition);
  } catch (err) {
    if (err instanceof LifecycleError) {
      throw new ArticleError(err.kind, err.message);
    }
    throw err;
  }
}

export class ArticleError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'FORBIDDEN' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'ArticleError';
  }
}
