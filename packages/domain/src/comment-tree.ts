import { type Comment } from './comment';
import { ownerUserId } from './comment';
import { type AuthContext, type GatePolicy, actorId, hasPermission, isAuthorized } from './authorization';
import { Permission } from './permissions';

export const DELETED_PLACEHOLDER = '[deleted]';

/** A comment as one particular viewer is allowed to see it. */
export interface CommentView extends Comment {
  /** True when `content` holds the placeholder instead of the stored body. */
  redacted: boolean;
  canEdit: boolean;
  canDelete: boolean;
}

export interface CommentNode {
  comment: CommentView;
  children: CommentNode[];
}

export interface CommentForest {
  roots: CommentNode[];
  /** Every node of the forest by comment id. */
  byId: ReadonlyMap<number, CommentNode>;
  /** Ids attached as roots because their parent could not be linked. */
  orphans: number[];
}

/**
 * Whether a viewer may read the stored body of a removed comment: its own
 * author, or anyone holding a foreign comment permission.
 */
export function canViewRemovedContent(ctx: AuthContext, comment: Comment): boolean {
  const viewer = actorId(ctx);
  if (viewer !== null && viewer === ownerUserId(comment.owner)) {
    return true;
  }
  return (
    hasPermission(ctx, Permission.EditForeignComment) ||
    hasPermission(ctx, Permission.DeleteForeignComment)
  );
}

export function viewComment(
  comment: Comment,
  ctx: AuthContext,
  policy?: GatePolicy,
): CommentView {
  const owner = ownerUserId(comment.owner);
  const redacted = !comment.visible && !canViewRemovedContent(ctx, comment);
  return {
    ...comment,
    content: redacted ? DELETED_PLACEHOLDER : comment.content,
    redacted,
    canEdit: isAuthorized(ctx, 'comment:edit', owner, policy),
    canDelete: isAuthorized(ctx, 'comment:delete', owner, policy),
  };
}

/**
 * Links one article's comments, ordered oldest first, into a forest. A comment
 * only attaches to a parent that appeared earlier in the input; a missing,
 * foreign-article, self-referencing or later parent leaves it at the root and
 * records it in `orphans`. Removed comments stay in place so their replies
 * keep their position.
 */
export function buildCommentForest(
  comments: readonly Comment[],
  ctx: AuthContext,
  policy?: GatePolicy,
): CommentForest {
  const byId = new Map<number, CommentNode>();
  const roots: CommentNode[] = [];
  const orphans: number[] = [];

  for (const comment of comments) {
    const node: CommentNode = { comment: viewComment(comment, ctx, policy), children: [] };

    if (comment.parentId === null) {
      roots.push(node);
    } else {
      const parent = byId.get(comment.parentId);
      if (parent && parent.comment.articleId === comment.articleId) {
        parent.children.push(node);
      } else {
        roots.push(node);
        orphans.push(comment.id);
      }
    }

    byId.set(comment.id, node);
  }

  return { roots, byId, orphans };
}

/**
 * The subtree containing comment `id`, rooted `context` levels above it (or at
 * its topmost ancestor when the thread is shallower).
 */
export function findSubtree(forest: CommentForest, id: number, context = 0): CommentNode | null {
  let node = forest.byId.get(id);
  if (!node) return null;

  for (let level = 0; level < context; level++) {
    const parentId: number | null = node.comment.parentId;
    const parent: CommentNode | undefined = parentId === null ? undefined : forest.byId.get(parentId);
    if (!parent || !parent.children.includes(node)) break;
    node = parent;
  }

  return node;
}

/** Depth-first, parents before children. */
export function flattenForest(roots: readonly CommentNode[]): CommentNode[] {
  const result: CommentNode[] = [];
  const stack = [...roots].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    result.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return result;
}
