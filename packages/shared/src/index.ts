export { createLogger, redactLogMeta, type SafeLogger } from './logger';
export { AppError, ErrorCode, type FieldIssue } from './errors';
export {
  loadConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  ApiConfigSchema,
  type BaseConfig,
  type ApiConfig,
} from './config';
export { Argon2PasswordHasher } from './auth/password-hasher';
export { RandomSessionTokens } from './auth/session-token';
export { MarkdownItRenderer } from './markdown/markdown-renderer';
export { FixedWindowLimiter, InMemoryCommentRateLimiter } from './rate-limiter';
