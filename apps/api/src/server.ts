import Fastify from 'fastify';
import fastifyCookie from '@fastify/cookie';
import { createLogger } from '@inkwell/shared';
import {
  type AuthService,
  type UserService,
  type ArticleService,
  type CommentService,
} from '@inkwell/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { registerSessionContext, type SessionCookieOptions } from './plugins/session';
import { createAuthRateLimit } from './plugins/rate-limit';
import { registerUserRoutes } from './routes/users';
import { registerArticleRoutes } from './routes/articles';
import { registerCommentRoutes } from './routes/comments';

const logger = createLogger({ name: 'api' });

export interface ServerConfig {
  cookie: SessionCookieOptions;
  authRateLimit: { windowMs: number; maxRequests: number };
  trustProxy: boolean;
}

export interface ApiServices {
  authService: AuthService;
  userService: UserService;
  articleService: ArticleService;
  commentService: CommentService;
}

export async function buildServer(config: ServerConfig, services: ApiServices) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
    trustProxy: config.trustProxy,
  });

  registerErrorHandler(app);

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
        requestId: request.id,
      },
      'Request completed',
    );
    done();
  });

  await app.register(fastifyCookie);
  registerSessionContext(app, services.authService);

  const authRateLimit = createAuthRateLimit(config.authRateLimit);

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerUserRoutes(app, {
    authService: services.authService,
    userService: services.userService,
    commentService: services.commentService,
    cookie: config.cookie,
    authRateLimit,
  });
  registerArticleRoutes(app, { articleService: services.articleService });
  registerCommentRoutes(app, { commentService: services.commentService });

  return app;
}
