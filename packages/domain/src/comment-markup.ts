import { type CommentNode, type CommentView } from './comment-tree';
import { type MarkdownRenderer } from './ports';

/** Display names of the registered users appearing in a thread, by user id. */
export type DisplayNames = ReadonlyMap<string, string>;

export function displayNameOf(comment: CommentView, names: DisplayNames): string {
  if (comment.owner.kind === 'guest') return comment.owner.name;
  return names.get(comment.owner.userId) ?? comment.owner.userId;
}

export function renderCommentBody(comment: CommentView, markdown: MarkdownRenderer): string {
  if (comment.redacted) {
    return markdown.escape(comment.content);
  }
  return markdown.render(comment.content);
}

function renderNode(node: CommentNode, names: DisplayNames, markdown: MarkdownRenderer): string {
  const { comment } = node;
  const classes = ['comment'];
  if (!comment.visible) classes.push('removed');
  if (comment.owner.kind === 'guest') classes.push('guest');

  const timestamp = comment.createdAt.toISOString();
  const replies = node.children.map((child) => renderNode(child, names, markdown)).join('');

  return (
    `<article class="${classes.join(' ')}" data-id="${comment.id}">` +
    `<header><span class="author">${markdown.escape(displayNameOf(comment, names))}</span> ` +
    `<time datetime="${timestamp}">${timestamp}</time></header>` +
    `<div class="body">${renderCommentBody(comment, markdown)}</div>` +
    `<div class="replies">${replies}</div>` +
    `</article>`
  );
}

/** Nested markup for a list of sibling threads. */
export function renderCommentTree(
  nodes: readonly CommentNode[],
  names: DisplayNames,
  markdown: MarkdownRenderer,
): string {
  return nodes.map((node) => renderNode(node, names, markdown)).join('');
}
