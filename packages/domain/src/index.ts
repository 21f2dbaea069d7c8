export type { User, Group, Session, PublicUser } from './user';
export { toPublicUser, isSessionExpired } from './user';
export { Permission, isPermission, groupHasPermission, parsePermissions } from './permissions';
export {
  ANONYMOUS_CONTEXT,
  DEFAULT_GATE_POLICY,
  isAuthorized,
  actorId,
  hasPermission,
  type AuthContext,
  type GatePolicy,
  type Action,
} from './authorization';
export type { Article } from './article';
export {
  ARTICLES_PER_PAGE,
  MAX_RECORD_ID,
  findIllegalSlugChar,
  findArticleByRef,
  parseArticleRef,
  canReadArticle,
} from './article';
export type { Comment, CommentOwner } from './comment';
export { createCommentOwner, ownerUserId, CommentOwnerError } from './comment';
export {
  DELETED_PLACEHOLDER,
  buildCommentForest,
  findSubtree,
  flattenForest,
  viewComment,
  canViewRemovedContent,
  type CommentForest,
  type CommentNode,
  type CommentView,
} from './comment-tree';
export {
  renderCommentTree,
  renderCommentBody,
  displayNameOf,
  type DisplayNames,
} from './comment-markup';
export {
  nextState,
  stateOf,
  transitionAction,
  LifecycleError,
  type ContentState,
  type LifecycleTransition,
} from './lifecycle';
export {
  RESERVED_USER_IDS,
  INITIAL_ADMIN_GROUP,
  DEFAULT_USER_GROUP,
  isUserIdReserved,
  sessionExpiry,
} from './auth';
export type {
  TransactionRunner,
  UserRepository,
  GroupRepository,
  SessionRepository,
  ArticleRepository,
  CommentRepository,
  PasswordHasher,
  SessionTokens,
  MarkdownRenderer,
  CommentRateLimiter,
} from './ports';
export {
  AuthService,
  AuthError,
  type AuthServiceDeps,
  type IssuedSession,
  type LoginResult,
  type SignupResult,
} from './auth-service';
export { UserService, UserError, type UserServiceDeps, type AccountDetails } from './user-service';
export {
  ArticleService,
  ArticleError,
  type ArticleServiceDeps,
  type ArticleView,
  type ArticleInput,
} from './article-service';
export {
  CommentService,
  CommentError,
  type CommentServiceDeps,
  type CommentThread,
  type SubmitCommentInput,
} from './comment-service';
