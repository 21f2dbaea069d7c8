import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, FixedWindowLimiter, createLogger } from '@inkwell/shared';

const logger = createLogger({ name: 'api:rate-limit' });

/** preHandler capping login and signup attempts per client IP. */
export function createAuthRateLimit(opts: { windowMs: number; maxRequests: number }) {
  const limiter = new FixedWindowLimiter(opts.maxRequests, opts.windowMs);

  return async function authRateLimit(request: FastifyRequest): Promise<void> {
    if (!limiter.take(request.ip)) {
      logger.warn({ requestId: request.id, route: request.routeOptions.url }, 'Auth rate limit exceeded');
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many attempts, please try again later');
    }
  };
}

export type AuthRateLimitHook = ReturnType<typeof createAuthRateLimit>;
