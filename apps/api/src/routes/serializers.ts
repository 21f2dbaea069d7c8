import { type Article, type ArticleView, type CommentNode, type CommentView } from '@inkwell/domain';
import {
  type ArticleResponse,
  type ArticleDetailResponse,
  type CommentResponse,
  type CommentNodeResponse,
} from '@inkwell/proto';

export function toArticleResponse(article: Article): ArticleResponse {
  return {
    id: article.id,
    title: article.title,
    authorId: article.authorId,
    slug: article.slug,
    content: article.content,
    createdAt: article.createdAt.toISOString(),
    visible: article.visible,
  };
}

export function toArticleDetailResponse(article: ArticleView): ArticleDetailResponse {
  return {
    ...toArticleResponse(article),
    html: article.html,
    canEdit: article.canEdit,
    canDelete: article.canDelete,
  };
}

export function toCommentResponse(comment: CommentView): CommentResponse {
  return {
    id: comment.id,
    parentId: comment.parentId,
    articleId: comment.articleId,
    owner:
      comment.owner.kind === 'user'
        ? { kind: 'user', userId: comment.owner.userId }
        : { kind: 'guest', name: comment.owner.name },
    content: comment.content,
    createdAt: comment.createdAt.toISOString(),
    visible: comment.visible,
    redacted: comment.redacted,
    canEdit: comment.canEdit,
    canDelete: comment.canDelete,
  };
}

export function toCommentNodeResponse(node: CommentNode): CommentNodeResponse {
  return {
    comment: toCommentResponse(node.comment),
    children: node.children.map(toCommentNodeResponse),
  };
}
