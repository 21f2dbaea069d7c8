import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@inkwell/shared';
import {
  AuthError,
  UserError,
  actorId,
  type AuthService,
  type CommentService,
  type UserService,
} from '@inkwell/domain';
import {
  SignupRequestSchema,
  LoginRequestSchema,
  ProfileRequestSchema,
  PasswordChangeRequestSchema,
  DeleteAccountRequestSchema,
  UserIdParamSchema,
} from '@inkwell/proto';
import {
  SESSION_COOKIE,
  authContextOf,
  clearSessionCookie,
  requireSession,
  setSessionCookie,
  type SessionCookieOptions,
} from '../plugins/session';
import { type AuthRateLimitHook } from '../plugins/rate-limit';
import { parseOrThrow } from './validation';
import { toCommentResponse } from './serializers';
import { FORBIDDEN_MESSAGE } from './errors';

interface UserRouteDeps {
  authService: AuthService;
  userService: UserService;
  commentService: CommentService;
  cookie: SessionCookieOptions;
  authRateLimit: AuthRateLimitHook;
}

function mapUserError(err: unknown): never {
  if (err instanceof AuthError || err instanceof UserError) {
    const codeMap: Record<AuthError['kind'] | UserError['kind'], ErrorCode> = {
      UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
      FORBIDDEN: ErrorCode.FORBIDDEN,
      CONFLICT: ErrorCode.CONFLICT,
      VALIDATION: ErrorCode.VALIDATION,
      NOT_FOUND: ErrorCode.NOT_FOUND,
    };
    const code = codeMap[err.kind];
    throw new AppError(code, code === ErrorCode.FORBIDDEN ? FORBIDDEN_MESSAGE : err.message);
  }
  throw err;
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { authService, userService, commentService, cookie, authRateLimit } = deps;

  app.post('/api/users/signup', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseOrThrow(SignupRequestSchema, request.body, 'Invalid signup data');

    try {
      const result = await authService.signup(authContextOf(request), body);
      if (result.session) {
        setSessionCookie(reply, result.session, cookie);
      }
      return reply.status(201).send({ user: result.user });
    } catch (err) {
      return mapUserError(err);
    }
  });

  app.post('/api/users/login', { preHandler: [authRateLimit] }, async (request, reply) => {
    const body = parseOrThrow(LoginRequestSchema, request.body, 'Invalid login data');

    try {
      const result = await authService.login(body);
      setSessionCookie(reply, result.session, cookie);
      return reply.status(200).send({ user: result.user });
    } catch (err) {
      return mapUserError(err);
    }
  });

  app.post('/api/users/logout', async (request, reply) => {
    const token = request.cookies[SESSION_COOKIE];
    if (token) {
      await authService.logout(token);
    }
    clearSessionCookie(reply, cookie);
    return reply.status(204).send();
  });

  app.get('/api/users/me', { preHandler: [requireSession] }, async (request, reply) => {
    const me = await userService.getMe(authContextOf(request));
    if (!me) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Sign in required');
    }
    return reply.status(200).send(me);
  });

  app.get('/api/users/:id', async (request, reply) => {
    const { id } = parseOrThrow(UserIdParamSchema, request.params, 'Invalid user id');

    try {
      const user = await userService.getProfile(id);
      return reply.status(200).send(user);
    } catch (err) {
      return mapUserError(err);
    }
  });

  app.get('/api/users/:id/comments', async (request, reply) => {
    const { id } = parseOrThrow(UserIdParamSchema, request.params, 'Invalid user id');

    try {
      const user = await userService.getProfile(id);
      const comments = await commentService.listByUser(authContextOf(request), id);
      return reply.status(200).send({ user, comments: comments.map(toCommentResponse) });
    } catch (err) {
      return mapUserError(err);
    }
  });

  app.post('/api/users/:id/profile', { preHandler: [requireSession] }, async (request, reply) => {
    const { id } = parseOrThrow(UserIdParamSchema, request.params, 'Invalid user id');
    const body = parseOrThrow(ProfileRequestSchema, request.body, 'Invalid profile data');

    try {
      const account = await userService.updateProfile(authContextOf(request), id, body);
      return reply.status(200).send(account);
    } catch (err) {
      return mapUserError(err);
    }
  });

  app.post('/api/users/:id/password', { preHandler: [requireSession] }, async (request, reply) => {
    const { id } = parseOrThrow(UserIdParamSchema, request.params, 'Invalid user id');
    const body = parseOrThrow(PasswordChangeRequestSchema, request.body, 'Invalid password data');

    try {
      await userService.changePassword(authContextOf(request), id, body);
      return reply.status(204).send();
    } catch (err) {
      return mapUserError(err);
    }
  });

  app.post('/api/users/:id/delete', { preHandler: [requireSession] }, async (request, reply) => {
    const { id } = parseOrThrow(UserIdParamSchema, request.params, 'Invalid user id');
    const body = parseOrThrow(DeleteAccountRequestSchema, request.body ?? {}, 'Invalid request');
    const ctx = authContextOf(request);

    try {
      await userService.deleteAccount(ctx, id, body);
    } catch (err) {
      return mapUserError(err);
    }

    if (actorId(ctx) === id) {
      clearSessionCookie(reply, cookie);
    }
    return reply.status(204).send();
  });
}
