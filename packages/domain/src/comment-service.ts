import { type Article, canReadArticle, findArticleByRef } from './article';
import { type Comment, type CommentOwner, ownerUserId } from './comment';
import {
  type CommentNode,
  type CommentView,
  buildCommentForest,
  canViewRemovedContent,
  findSubtree,
  flattenForest,
  viewComment,
} from './comment-tree';
import { type DisplayNames, renderCommentBody, renderCommentTree } from './comment-markup';
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
  type UserRepository,
  type MarkdownRenderer,
  type CommentRateLimiter,
  type TransactionRunner,
} from './ports';

export interface CommentServiceDeps {
  commentRepo: CommentRepository;
  articleRepo: ArticleRepository;
  userRepo: UserRepository;
  markdown: MarkdownRenderer;
  rateLimiter: CommentRateLimiter;
  withTransaction: TransactionRunner;
  policy: GatePolicy;
}

export interface CommentThread {
  articleId: number;
  roots: CommentNode[];
  /** Comments whose parent link was broken and that were shown at the top level. */
  orphans: number[];
}

export interface SubmitCommentInput {
  articleId: number;
  parentId: number | null;
  /** Guest display name; only for anonymous callers. */
  name: string | null;
  content: string;
}

export class CommentService {
  constructor(private readonly deps: CommentServiceDeps) {}

  async listTree(ctx: AuthContext, articleRef: string): Promise<CommentThread> {
    return this.deps.withTransaction(async (tx) => {
      const article = await this.findViewableArticle(tx, ctx, articleRef);
      const comments = await this.deps.commentRepo.listByArticle(tx, article.id);
      const forest = buildCommentForest(comments, ctx, this.deps.policy);
      return { articleId: article.id, roots: forest.roots, orphans: forest.orphans };
    });
  }

  /** The thread around one comment, starting `context` ancestors above it. */
  async viewSubtree(ctx: AuthContext, id: number, context = 0): Promise<CommentNode> {
    return this.deps.withTransaction((tx) => this.loadSubtree(tx, ctx, id, context));
  }

  async renderSubtree(ctx: AuthContext, id: number, context = 0): Promise<string> {
    return this.deps.withTransaction(async (tx) => {
      const node = await this.loadSubtree(tx, ctx, id, context);
      const names = await this.loadDisplayNames(tx, flattenForest([node]).map((n) => n.comment));
      return renderCommentTree([node], names, this.deps.markdown);
    });
  }

  async renderContent(ctx: AuthContext, id: number): Promise<string> {
    return this.deps.withTransaction(async (tx) => {
      const comment = await this.findComment(tx, ctx, id);
      return renderCommentBody(viewComment(comment, ctx, this.deps.policy), this.deps.markdown);
    });
  }

  /**
   * The stored markdown of a comment, for prefilling an edit form. Removed
   * comments are only readable by their author and foreign moderators.
   */
  async getSource(ctx: AuthContext, id: number): Promise<Comment> {
    return this.deps.withTransaction(async (tx) => {
      const comment = await this.findComment(tx, ctx, id);
      if (!comment.visible && !canViewRemovedContent(ctx, comment)) {
        throw new CommentError('FORBIDDEN', 'Not allowed to view this comment');
      }
      return comment;
    });
  }

  async submit(ctx: AuthContext, input: SubmitCommentInput, clientKey: string): Promise<CommentView> {
    const { commentRepo, rateLimiter, policy } = this.deps;
    const owner = resolveOwner(ctx, input.name);

    if (!isAuthorized(ctx, 'comment:create', null, policy)) {
      throw new CommentError('FORBIDDEN', 'Not allowed to comment');
    }

    return this.deps.withTransaction(async (tx) => {
      const article = await this.findViewableArticle(tx, ctx, String(input.articleId));

      if (input.parentId !== null) {
        const parent = await commentRepo.findById(tx, input.parentId);
        if (!parent || parent.articleId !== article.id) {
          throw new CommentError('NOT_FOUND', 'Parent comment not found');
        }
      }

      // only submissions that would be stored spend the budget
      const allowed = await rateLimiter.checkSubmitRate(ctx.session?.userId ?? clientKey, article.id);
      if (!allowed) {
        throw new CommentError('RATE_LIMITED', 'Too many comments, slow down');
      }

      const created = await commentRepo.create(tx, {
        parentId: input.parentId,
        articleId: article.id,
        owner,
        content: input.content,
      });
      return viewComment(created, ctx, policy);
    });
  }

  async edit(ctx: AuthContext, id: number, content: string): Promise<CommentView> {
    const { commentRepo, policy } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const comment = await this.findComment(tx, ctx, id);
      if (!isAuthorized(ctx, 'comment:edit', ownerUserId(comment.owner), policy)) {
        throw new CommentError('FORBIDDEN', 'Not allowed to edit this comment');
      }

      const updated = await commentRepo.updateContent(tx, id, content);
      if (!updated) {
        throw new CommentError('NOT_FOUND', 'Comment not found');
      }
      return viewComment(updated, ctx, policy);
    });
  }

  async remove(ctx: AuthContext, id: number): Promise<CommentView> {
    return this.transition(ctx, id, 'remove');
  }

  async restore(ctx: AuthContext, id: number): Promise<CommentView> {
    return this.transition(ctx, id, 'restore');
  }

  /** Hard delete. Comments that still have replies cannot be purged. */
  async purge(ctx: AuthContext, id: number): Promise<void> {
    await this.transition(ctx, id, 'purge');
  }

  /** A user's visible comments on articles the caller may read, newest first. */
  async listByUser(ctx: AuthContext, userId: string): Promise<CommentView[]> {
    const { commentRepo, articleRepo, policy } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const comments = await commentRepo.listByAuthor(tx, userId);
      const readable = new Map<number, boolean>();

      const result: CommentView[] = [];
      for (const comment of comments) {
        if (!comment.visible) continue;
        let ok = readable.get(comment.articleId);
        if (ok === undefined) {
          const article = await articleRepo.findById(tx, comment.articleId);
          ok = article !== null && canReadArticle(ctx, article, policy);
          readable.set(comment.articleId, ok);
        }
        if (ok) result.push(viewComment(comment, ctx, policy));
      }
      return result;
    });
  }

  private async transition(
    ctx: AuthContext,
    id: number,
    transition: LifecycleTransition,
  ): Promise<CommentView> {
    const { commentRepo, policy } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const comment = await this.findComment(tx, ctx, id);
      const action = transitionAction('comment', transition);
      if (!isAuthorized(ctx, action, ownerUserId(comment.owner), policy)) {
        throw new CommentError('FORBIDDEN', 'Not allowed to change this comment');
      }

      const target = applyTransition(stateOf(comment), transition);
      if (target === 'purged') {
        if ((await commentRepo.countChildren(tx, id)) > 0) {
          throw new CommentError('CONFLICT', 'Comment has replies; purge them first');
        }
        await commentRepo.delete(tx, id);
      } else {
        await commentRepo.setVisible(tx, id, target === 'visible');
      }

      return viewComment({ ...comment, visible: target === 'visible' }, ctx, policy);
    });
  }

  private async loadSubtree(
    tx: unknown,
    ctx: AuthContext,
    id: number,
    context: number,
  ): Promise<CommentNode> {
    const comment = await this.findComment(tx, ctx, id);
    const comments = await this.deps.commentRepo.listByArticle(tx, comment.articleId);
    const node = findSubtree(buildCommentForest(comments, ctx, this.deps.policy), id, context);
    if (!node) {
      throw new CommentError('NOT_FOUND', 'Comment not found');
    }
    return node;
  }

  /** A comment whose article the caller may read. */
  private async findComment(tx: unknown, ctx: AuthContext, id: number): Promise<Comment> {
    const comment = await this.deps.commentRepo.findById(tx, id);
    if (!comment) {
      throw new CommentError('NOT_FOUND', 'Comment not found');
    }
    const article = await this.deps.articleRepo.findById(tx, comment.articleId);
    if (!article || !canReadArticle(ctx, article, this.deps.policy)) {
      throw new CommentError('NOT_FOUND', 'Comment not found');
    }
    return comment;
  }

  private async findViewableArticle(tx: unknown, ctx: AuthContext, ref: string): Promise<Article> {
    const article = await findArticleByRef(this.deps.articleRepo, tx, ref);
    if (!article || !canReadArticle(ctx, article, this.deps.policy)) {
      throw new CommentError('NOT_FOUND', 'Article not found');
    }
    return article;
  }

  private async loadDisplayNames(tx: unknown, comments: readonly Comment[]): Promise<DisplayNames> {
    const ids = new Set<string>();
    for (const comment of comments) {
      const userId = ownerUserId(comment.owner);
      if (userId !== null) ids.add(userId);
    }
    if (ids.size === 0) return new Map();

    const users = await this.deps.userRepo.findByIds(tx, [...ids]);
    return new Map(users.map((user) => [user.id, user.name]));
  }
}

/** Signed-in callers post as themselves; anonymous callers must give a name. */
function resolveOwner(ctx: AuthContext, name: string | null): CommentOwner {
  if (ctx.session) {
    if (name !== null) {
      throw new CommentError('VALIDATION', 'Signed-in users cannot post under a guest name');
    }
    return { kind: 'user', userId: ctx.session.userId };
  }
  if (name === null || name.trim().length === 0) {
    throw new CommentError('VALIDATION', 'A name is required to comment without an account');
  }
  return { kind: 'guest', name: name.trim() };
}

function applyTransition(state: ContentState, transition: LifecycleTransition): ContentState {
  try {
    return nextState(state, transition);
  } catch (err) {
    if (err instanceof LifecycleError) {
      throw new CommentError(err.kind, err.message);
    }
    throw err;
  }
}

export class CommentError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'FORBIDDEN' | 'CONFLICT' | 'RATE_LIMITED',
    message: string,
  ) {
    super(message);
    this.name = 'CommentError';
  }
}
