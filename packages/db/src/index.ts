export { initPool, closePool, getPool, withTransaction, runInTransaction } from './client';
export { PgUserRepository } from './repositories/user-repository';
export { PgGroupRepository } from './repositories/group-repository';
export { PgSessionRepository } from './repositories/session-repository';
export { PgArticleRepository } from './repositories/article-repository';
export { PgCommentRepository } from './repositories/comment-repository';
