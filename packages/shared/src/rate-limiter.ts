import { type CommentRateLimiter } from '@inkwell/domain';

/**
 * Fixed-window counter per key. Single-node only; counts live in process
 * memory and expired windows are dropped as new hits arrive.
 */
export class FixedWindowLimiter {
  private readonly windows = new Map<string, { count: number; resetAt: number }>();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number,
  ) {}

  /** Records one hit for `key`; false once the window's budget is spent. */
  take(key: string): boolean {
    const now = Date.now();
    this.evictExpired(now);

    const window = this.windows.get(key);
    if (!window) {
      this.windows.set(key, { count: 1, resetAt: now + this.windowMs });
      return true;
    }

    if (window.count >= this.maxPerWindow) {
      return false;
    }

    window.count++;
    return true;
  }

  private evictExpired(now: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
  }
}

/** Comment submission budget, keyed by actor and article. */
export class InMemoryCommentRateLimiter implements CommentRateLimiter {
  private readonly limiter: FixedWindowLimiter;

  constructor(maxPerWindow = 5, windowMs = 60_000) {
    this.limiter = new FixedWindowLimiter(maxPerWindow, windowMs);
  }

  async checkSubmitRate(actorKey: string, articleId: number): Promise<boolean> {
    return this.limiter.take(`${actorKey}:${articleId}`);
  }
}
