import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AuthService, AuthError, type AuthServiceDeps } from '../auth-service';
import { ANONYMOUS_CONTEXT, DEFAULT_GATE_POLICY } from '../authorization';
import { type TransactionRunner } from '../ports';
import { type Session, type User } from '../user';
import {
  ADMIN_GROUP,
  DEFAULT_GROUP,
  contextFor,
  createTransactionRunner,
  makeUser,
} from './fixtures';

const NOW = new Date('2026-05-01T00:00:00.000Z');

function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: 'sha256:raw-session-token',
    userId: 'alice',
    expiresAt: new Date('2026-05-31T00:00:00.000Z'),
    ...overrides,
  };
}

function createMockDeps(
  withTransaction: TransactionRunner,
  overrides: Partial<AuthServiceDeps> = {},
): AuthServiceDeps {
  return {
    userRepo: {
      create: vi.fn(async (_tx: unknown, user: User) => makeUser(user)),
      findById: vi.fn(async () => null),
      findByIds: vi.fn(async () => []),
      count: vi.fn(async () => 3),
      lockSignups: vi.fn(async () => {}),
      updateProfile: vi.fn(async () => null),
      updatePassword: vi.fn(async () => {}),
      delete: vi.fn(async () => {}),
    },
    groupRepo: {
      findById: vi.fn(async (_tx: unknown, id: string) => (id === 'admin' ? ADMIN_GROUP : DEFAULT_GROUP)),
    },
    sessionRepo: {
      create: vi.fn(async () => {}),
      findById: vi.fn(async () => null),
      delete: vi.fn(async () => {}),
      deleteAllForUser: vi.fn(async () => {}),
      deleteExpired: vi.fn(async () => 2),
    },
    passwordHasher: {
      hash: vi.fn(async (p: string) => `hashed:${p}`),
      verify: vi.fn(async (p: string, h: string) => h === `hashed:${p}`),
    },
    sessionTokens: {
      generate: vi.fn(() => 'raw-session-token'),
      hash: vi.fn((t: string) => `sha256:${t}`),
    },
    withTransaction,
    policy: DEFAULT_GATE_POLICY,
    sessionTtlDays: 30,
    now: () => NOW,
    ...overrides,
  };
}

const SIGNUP = { id: 'bob', password: 'test-password', name: 'Bob', email: 'bob@example.com' };

describe('AuthService', () => {
  let deps: AuthServiceDeps;
  let service: AuthService;
  let transactions: ReturnType<typeof createTransactionRunner>;

  beforeEach(() => {
    transactions = createTransactionRunner();
    deps = createMockDeps(transactions.run);
    service = new AuthService(deps);
  });

  describe('signup', () => {
    it('takes the sign-up lock before counting accounts', async () => {
      vi.mocked(deps.userRepo.count).mockResolvedValueOnce(0);

      await service.signup(ANONYMOUS_CONTEXT, SIGNUP);

      expect(deps.userRepo.lockSignups).toHaveBeenCalledWith({});
      const [lockOrder] = vi.mocked(deps.userRepo.lockSignups).mock.invocationCallOrder;
      const [countOrder] = vi.mocked(deps.userRepo.count).mock.invocationCallOrder;
      expect(lockOrder).toBeLessThan(countOrder);
    });

    it('makes the first account an administrator and signs it in', async () => {
      vi.mocked(deps.userRepo.count).mockResolvedValueOnce(0);

      const result = await service.signup(ANONYMOUS_CONTEXT, SIGNUP);

      expect(result.user).toEqual({ id: 'bob', name: 'Bob' });
      expect(result.session).toEqual({
        token: 'raw-session-token',
        expiresAt: new Date('2026-05-31T00:00:00.000Z'),
      });
      expect(deps.userRepo.create).toHaveBeenCalledWith({}, {
        id: 'bob',
        passwordHash: 'hashed:test-password',
        name: 'Bob',
        email: 'bob@example.com',
        groupId: 'admin',
      });
      expect(deps.sessionRepo.create).toHaveBeenCalledWith({}, {
        id: 'sha256:raw-session-token',
        userId: 'bob',
        expiresAt: new Date('2026-05-31T00:00:00.000Z'),
      });
    });

    it('rejects anonymous signups while signups are closed', async () => {
      await expect(service.signup(ANONYMOUS_CONTEXT, SIGNUP)).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
      expect(deps.userRepo.create).not.toHaveBeenCalled();
    });

    it('accepts anonymous signups into the default group when open', async () => {
      service = new AuthService({ ...deps, policy: { ...DEFAULT_GATE_POLICY, allowSignups: true } });

      const result = await service.signup(ANONYMOUS_CONTEXT, SIGNUP);

      expect(result.session?.token).toBe('raw-session-token');
      expect(vi.mocked(deps.userRepo.create).mock.calls[0]?.[1].groupId).toBe('default');
    });

    it('lets an administrator create accounts without switching session', async () => {
      const result = await service.signup(contextFor('root', ADMIN_GROUP), SIGNUP);

      expect(result.user.id).toBe('bob');
      expect(result.session).toBeNull();
      expect(deps.sessionRepo.create).not.toHaveBeenCalled();
    });

    it('rejects reserved ids', async () => {
      await expect(
        service.signup(contextFor('root', ADMIN_GROUP), { ...SIGNUP, id: 'Admin' }),
      ).rejects.toMatchObject({ kind: 'CONFLICT', message: 'Username is not available' });
    });

    it('rejects taken ids', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValueOnce(makeUser({ id: 'bob' }));

      await expect(service.signup(contextFor('root', ADMIN_GROUP), SIGNUP)).rejects.toThrow(AuthError);
    });
  });

  describe('login', () => {
    it('issues a session for valid credentials', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValueOnce(makeUser());

      const result = await service.login({ id: 'alice', password: 'test-password' });

      expect(result.user).toEqual({ id: 'alice', name: 'Alice' });
      expect(result.session.token).toBe('raw-session-token');
      expect(deps.sessionRepo.create).toHaveBeenCalledOnce();
    });

    it('rejects unknown users', async () => {
      await expect(service.login({ id: 'nobody', password: 'test-password' })).rejects.toMatchObject({
        kind: 'UNAUTHORIZED',
        message: 'Invalid credentials',
      });
    });

    it('rejects a wrong password with the same error', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValueOnce(makeUser());

      await expect(service.login({ id: 'alice', password: 'wrong-password' })).rejects.toMatchObject({
        kind: 'UNAUTHORIZED',
        message: 'Invalid credentials',
      });
      expect(deps.sessionRepo.create).not.toHaveBeenCalled();
    });
  });

  describe('logout', () => {
    it('deletes the session by its digest', async () => {
      await service.logout('raw-session-token');
      expect(deps.sessionRepo.delete).toHaveBeenCalledWith({}, 'sha256:raw-session-token');
    });
  });

  describe('resolveSession', () => {
    it('returns the anonymous context without a token', async () => {
      expect(await service.resolveSession(undefined)).toBe(ANONYMOUS_CONTEXT);
      expect(transactions.calls).not.toHaveBeenCalled();
    });

    it('returns the anonymous context for an unknown token', async () => {
      expect(await service.resolveSession('raw-session-token')).toBe(ANONYMOUS_CONTEXT);
    });

    it('resolves a live session to its user group', async () => {
      const session = makeSession();
      vi.mocked(deps.sessionRepo.findById).mockResolvedValueOnce(session);
      vi.mocked(deps.userRepo.findById).mockResolvedValueOnce(makeUser());

      const ctx = await service.resolveSession('raw-session-token');

      expect(ctx).toEqual({ session, group: DEFAULT_GROUP });
      expect(deps.sessionRepo.findById).toHaveBeenCalledWith({}, 'sha256:raw-session-token');
    });

    it('treats an expired session like a missing one', async () => {
      vi.mocked(deps.sessionRepo.findById).mockResolvedValueOnce(makeSession({ expiresAt: NOW }));

      expect(await service.resolveSession('raw-session-token')).toBe(ANONYMOUS_CONTEXT);
      expect(deps.userRepo.findById).not.toHaveBeenCalled();
    });

    it('treats a session of a deleted user as anonymous', async () => {
      vi.mocked(deps.sessionRepo.findById).mockResolvedValueOnce(makeSession());

      expect(await service.resolveSession('raw-session-token')).toBe(ANONYMOUS_CONTEXT);
    });

    it('fails when the user group is missing', async () => {
      vi.mocked(deps.sessionRepo.findById).mockResolvedValueOnce(makeSession());
      vi.mocked(deps.userRepo.findById).mockResolvedValueOnce(makeUser({ groupId: 'gone' }));
      vi.mocked(deps.groupRepo.findById).mockResolvedValueOnce(null);

      await expect(service.resolveSession('raw-session-token')).rejects.toMatchObject({
        kind: 'NOT_FOUND',
        message: 'Group not found',
      });
    });
  });

  describe('pruneExpiredSessions', () => {
    it('returns how many sessions were removed', async () => {
      expect(await service.pruneExpiredSessions()).toBe(2);
    });
  });
});
