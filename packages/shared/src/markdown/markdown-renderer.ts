import MarkdownIt from 'markdown-it';
import { type MarkdownRenderer } from '@inkwell/domain';

/**
 * markdown-it backed renderer. Comment bodies come from untrusted visitors and
 * render with raw HTML escaped; article bodies come from accounts holding
 * CreateArticle and may embed HTML.
 */
export class MarkdownItRenderer implements MarkdownRenderer {
  private readonly untrusted: MarkdownIt;
  private readonly trusted: MarkdownIt;

  constructor() {
    this.untrusted = new MarkdownIt({ html: false, linkify: true });
    this.trusted = new MarkdownIt({ html: true, linkify: true });
  }

  render(markdown: string): string {
    return this.untrusted.render(markdown);
  }

  renderTrusted(markdown: string): string {
    return this.trusted.render(markdown);
  }

  escape(text: string): string {
    return this.untrusted.utils.escapeHtml(text);
  }
}
