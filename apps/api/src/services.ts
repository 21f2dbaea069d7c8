import {
  Argon2PasswordHasher,
  InMemoryCommentRateLimiter,
  MarkdownItRenderer,
  RandomSessionTokens,
  type ApiConfig,
} from '@inkwell/shared';
import {
  AuthService,
  UserService,
  ArticleService,
  CommentService,
  type GatePolicy,
} from '@inkwell/domain';
import {
  withTransaction,
  PgUserRepository,
  PgGroupRepository,
  PgSessionRepository,
  PgArticleRepository,
  PgCommentRepository,
} from '@inkwell/db';
import { type ApiServices } from './server';

/** Wires the domain services to PostgreSQL and the shared adapters. */
export function createServices(config: ApiConfig): ApiServices {
  const policy: GatePolicy = {
    allowAnonymousComments: config.ALLOW_ANONYMOUS_COMMENTS,
    allowSignups: config.ALLOW_SIGNUPS,
  };

  const userRepo = new PgUserRepository();
  const groupRepo = new PgGroupRepository();
  const sessionRepo = new PgSessionRepository();
  const articleRepo = new PgArticleRepository();
  const commentRepo = new PgCommentRepository();
  const passwordHasher = new Argon2PasswordHasher();
  const markdown = new MarkdownItRenderer();

  return {
    authService: new AuthService({
      userRepo,
      groupRepo,
      sessionRepo,
      passwordHasher,
      sessionTokens: new RandomSessionTokens(),
      withTransaction,
      policy,
      sessionTtlDays: config.SESSION_TTL_DAYS,
    }),
    userService: new UserService({
      userRepo,
      sessionRepo,
      articleRepo,
      commentRepo,
      passwordHasher,
      withTransaction,
      policy,
    }),
    articleService: new ArticleService({
      articleRepo,
      commentRepo,
      markdown,
      withTransaction,
      policy,
    }),
    commentService: new CommentService({
      commentRepo,
      articleRepo,
      userRepo,
      markdown,
      rateLimiter: new InMemoryCommentRateLimiter(),
      withTransaction,
      policy,
    }),
  };
}
