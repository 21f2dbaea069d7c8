import { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@inkwell/shared';
import {
  ANONYMOUS_CONTEXT,
  AuthError,
  type AuthContext,
  type AuthService,
  type IssuedSession,
} from '@inkwell/domain';

export const SESSION_COOKIE = 'session';

declare module 'fastify' {
  interface FastifyRequest {
    auth: AuthContext | null;
  }
}

export interface SessionCookieOptions {
  secure: boolean;
  domain?: string;
}

/**
 * Resolves the `session` cookie into an AuthContext on every request. Requires
 * @fastify/cookie to be registered first.
 */
export function registerSessionContext(app: FastifyInstance, authService: AuthService): void {
  app.decorateRequest('auth', null);

  app.addHook('onRequest', async (request) => {
    try {
      request.auth = await authService.resolveSession(request.cookies[SESSION_COOKIE]);
    } catch (err) {
      // a session whose user points at a deleted group
      if (err instanceof AuthError && err.kind === 'NOT_FOUND') {
        throw new AppError(ErrorCode.NOT_FOUND, err.message);
      }
      throw err;
    }
  });
}

export function authContextOf(request: FastifyRequest): AuthContext {
  return request.auth ?? ANONYMOUS_CONTEXT;
}

export async function requireSession(request: FastifyRequest): Promise<void> {
  if (!authContextOf(request).session) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Sign in required');
  }
}

export function setSessionCookie(
  reply: FastifyReply,
  session: IssuedSession,
  opts: SessionCookieOptions,
): void {
  reply.setCookie(SESSION_COOKIE, session.token, {
    httpOnly: true,
    sameSite: 'strict',
    secure: opts.secure,
    domain: opts.domain,
    path: '/',
    expires: session.expiresAt,
  });
}

export function clearSessionCookie(reply: FastifyReply, opts: SessionCookieOptions): void {
  reply.clearCookie(SESSION_COOKIE, { path: '/', domain: opts.domain });
}
