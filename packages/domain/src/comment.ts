/**
 * Who wrote a comment: a registered user, or a guest identified only by the
 * display name they typed.
 */
export type CommentOwner =
  | { kind: 'user'; userId: string }
  | { kind: 'guest'; name: string };

export interface Comment {
  id: number;
  parentId: number | null;
  articleId: number;
  owner: CommentOwner;
  content: string;
  createdAt: Date;
  visible: boolean;
}

export class CommentOwnerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommentOwnerError';
  }
}

/**
 * Builds an owner from the nullable author/name column pair, enforcing that
 * exactly one of them is set.
 */
export function createCommentOwner(authorId: string | null, name: string | null): CommentOwner {
  if (authorId !== null && name !== null) {
    throw new CommentOwnerError('Comment cannot have both an author and a guest name');
  }
  if (authorId !== null) {
    return { kind: 'user', userId: authorId };
  }
  if (name !== null && name.trim().length > 0) {
    return { kind: 'guest', name };
  }
  throw new CommentOwnerError('Comment needs either an author or a guest name');
}

export function ownerUserId(owner: CommentOwner): string | null {
  return owner.kind === 'user' ? owner.userId : null;
}
