import { type PublicUser, toPublicUser, isSessionExpired } from './user';
import { isUserIdReserved, sessionExpiry, INITIAL_ADMIN_GROUP, DEFAULT_USER_GROUP } from './auth';
import {
  type AuthContext,
  type GatePolicy,
  ANONYMOUS_CONTEXT,
  isAuthorized,
} from './authorization';
import {
  type UserRepository,
  type GroupRepository,
  type SessionRepository,
  type PasswordHasher,
  type SessionTokens,
  type TransactionRunner,
} from './ports';

export interface AuthServiceDeps {
  userRepo: UserRepository;
  groupRepo: GroupRepository;
  sessionRepo: SessionRepository;
  passwordHasher: PasswordHasher;
  sessionTokens: SessionTokens;
  withTransaction: TransactionRunner;
  policy: GatePolicy;
  sessionTtlDays: number;
  now?: () => Date;
}

/** A freshly created session; `token` is only ever returned here. */
export interface IssuedSession {
  token: string;
  expiresAt: Date;
}

export interface LoginResult {
  user: PublicUser;
  session: IssuedSession;
}

export interface SignupResult {
  user: PublicUser;
  /** Set when an anonymous visitor signed themselves up and is now logged in. */
  session: IssuedSession | null;
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  /**
   * Creates an account. The very first account of an installation becomes an
   * administrator without any authorization check; later accounts join the
   * default group and need `user:create`.
   */
  async signup(
    ctx: AuthContext,
    input: { id: string; password: string; name: string; email: string },
  ): Promise<SignupResult> {
    const { userRepo, passwordHasher, policy } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      await userRepo.lockSignups(tx);
      const isInitialSetup = (await userRepo.count(tx)) === 0;
      if (!isInitialSetup && !isAuthorized(ctx, 'user:create', null, policy)) {
        throw new AuthError('FORBIDDEN', 'Not allowed to create accounts');
      }

      if (isUserIdReserved(input.id)) {
        throw new AuthError('CONFLICT', 'Username is not available');
      }
      const existing = await userRepo.findById(tx, input.id);
      if (existing) {
        throw new AuthError('CONFLICT', 'Username is not available');
      }

      const user = await userRepo.create(tx, {
        id: input.id,
        passwordHash: await passwordHasher.hash(input.password),
        name: input.name,
        email: input.email,
        groupId: isInitialSetup ? INITIAL_ADMIN_GROUP : DEFAULT_USER_GROUP,
      });

      const session = ctx.session ? null : await this.issueSession(tx, user.id);
      return { user: toPublicUser(user), session };
    });
  }

  async login(input: { id: string; password: string }): Promise<LoginResult> {
    const { userRepo, passwordHasher } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findById(tx, input.id);
      if (!user) {
        throw new AuthError('UNAUTHORIZED', 'Invalid credentials');
      }

      const valid = await passwordHasher.verify(input.password, user.passwordHash);
      if (!valid) {
        throw new AuthError('UNAUTHORIZED', 'Invalid credentials');
      }

      const session = await this.issueSession(tx, user.id);
      return { user: toPublicUser(user), session };
    });
  }

  async logout(token: string): Promise<void> {
    const { sessionRepo, sessionTokens } = this.deps;
    return this.deps.withTransaction(async (tx) => {
      await sessionRepo.delete(tx, sessionTokens.hash(token));
    });
  }

  /**
   * Maps a cookie token to the caller's context. Missing, unknown and expired
   * tokens, and sessions whose user no longer exists, all resolve to the
   * anonymous context. A user whose group is gone is a broken invariant and
   * surfaces as NOT_FOUND.
   */
  async resolveSession(token: string | undefined): Promise<AuthContext> {
    if (!token) return ANONYMOUS_CONTEXT;
    const { sessionRepo, sessionTokens, userRepo, groupRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const session = await sessionRepo.findById(tx, sessionTokens.hash(token));
      if (!session || isSessionExpired(session, this.now())) {
        return ANONYMOUS_CONTEXT;
      }

      const user = await userRepo.findById(tx, session.userId);
      if (!user) return ANONYMOUS_CONTEXT;

      const group = await groupRepo.findById(tx, user.groupId);
      if (!group) {
        throw new AuthError('NOT_FOUND', 'Group not found');
      }

      return { session, group };
    });
  }

  /** Drops sessions past their expiry; returns how many were removed. */
  async pruneExpiredSessions(): Promise<number> {
    return this.deps.withTransaction((tx) => this.deps.sessionRepo.deleteExpired(tx));
  }

  private async issueSession(tx: unknown, userId: string): Promise<IssuedSession> {
    const { sessionRepo, sessionTokens, sessionTtlDays } = this.deps;
    const token = sessionTokens.generate();
    const expiresAt = sessionExpiry(this.now(), sessionTtlDays);
    await sessionRepo.create(tx, { id: sessionTokens.hash(token), userId, expiresAt });
    return { token, expiresAt };
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }
}

export class AuthError extends Error {
  constructor(
    public readonly kind: 'UNAUTHORIZED' | 'FORBIDDEN' | 'CONFLICT' | 'VALIDATION' | 'NOT_FOUND',
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
