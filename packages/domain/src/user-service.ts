import { type PublicUser, type User, toPublicUser } from './user';
import { type AuthContext, type GatePolicy, actorId, isAuthorized } from './authorization';
import {
  type UserRepository,
  type SessionRepository,
  type ArticleRepository,
  type CommentRepository,
  type PasswordHasher,
  type TransactionRunner,
} from './ports';

export interface UserServiceDeps {
  userRepo: UserRepository;
  sessionRepo: SessionRepository;
  articleRepo: ArticleRepository;
  commentRepo: CommentRepository;
  passwordHasher: PasswordHasher;
  withTransaction: TransactionRunner;
  policy: GatePolicy;
}

export type AccountDetails = Omit<User, 'passwordHash'>;

function toAccountDetails(user: User): AccountDetails {
  return { id: user.id, name: user.name, email: user.email, groupId: user.groupId };
}

export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  async getProfile(id: string): Promise<PublicUser> {
    return this.deps.withTransaction(async (tx) => {
      const user = await this.deps.userRepo.findById(tx, id);
      if (!user) {
        throw new UserError('NOT_FOUND', 'User not found');
      }
      return toPublicUser(user);
    });
  }

  async getMe(ctx: AuthContext): Promise<AccountDetails | null> {
    const userId = actorId(ctx);
    if (userId === null) return null;

    return this.deps.withTransaction(async (tx) => {
      const user = await this.deps.userRepo.findById(tx, userId);
      return user ? toAccountDetails(user) : null;
    });
  }

  async updateProfile(
    ctx: AuthContext,
    id: string,
    profile: { name: string; email: string },
  ): Promise<AccountDetails> {
    if (!isAuthorized(ctx, 'user:edit', id, this.deps.policy)) {
      throw new UserError('FORBIDDEN', 'Not allowed to edit this account');
    }

    return this.deps.withTransaction(async (tx) => {
      const updated = await this.deps.userRepo.updateProfile(tx, id, profile);
      if (!updated) {
        throw new UserError('NOT_FOUND', 'User not found');
      }
      return toAccountDetails(updated);
    });
  }

  /**
   * Changes the caller's own password and signs out every other session of
   * the account. Foreign password changes are not offered.
   */
  async changePassword(
    ctx: AuthContext,
    id: string,
    input: { currentPassword: string; newPassword: string },
  ): Promise<void> {
    const { userRepo, sessionRepo, passwordHasher } = this.deps;
    const session = ctx.session;
    if (!session || session.userId !== id) {
      throw new UserError('FORBIDDEN', 'Not allowed to change this password');
    }

    return this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findById(tx, id);
      if (!user) {
        throw new UserError('NOT_FOUND', 'User not found');
      }

      const valid = await passwordHasher.verify(input.currentPassword, user.passwordHash);
      if (!valid) {
        throw new UserError('VALIDATION', 'Current password is incorrect');
      }

      await userRepo.updatePassword(tx, id, await passwordHasher.hash(input.newPassword));
      await sessionRepo.deleteAllForUser(tx, id, session.id);
    });
  }

  /**
   * Deletes an account. Owners confirm with their password; holders of
   * DeleteForeignUser do not. Accounts that still own articles are kept, and
   * the account's comments live on as guest comments under its display name.
   */
  async deleteAccount(ctx: AuthContext, id: string, input: { password?: string }): Promise<void> {
    const { userRepo, sessionRepo, articleRepo, commentRepo, passwordHasher, policy } = this.deps;
    if (!isAuthorized(ctx, 'user:delete', id, policy)) {
      throw new UserError('FORBIDDEN', 'Not allowed to delete this account');
    }

    return this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findById(tx, id);
      if (!user) {
        throw new UserError('NOT_FOUND', 'User not found');
      }

      if (actorId(ctx) === id) {
        const valid =
          input.password !== undefined &&
          (await passwordHasher.verify(input.password, user.passwordHash));
        if (!valid) {
          throw new UserError('VALIDATION', 'Password is incorrect');
        }
      }

      if ((await articleRepo.countByAuthor(tx, id)) > 0) {
        throw new UserError('CONFLICT', 'Account still owns articles');
      }

      await commentRepo.convertAuthorToGuest(tx, id, user.name);
      await sessionRepo.deleteAllForUser(tx, id);
      await userRepo.delete(tx, id);
    });
  }
}

export class UserError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'FORBIDDEN' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'UserError';
  }
}
