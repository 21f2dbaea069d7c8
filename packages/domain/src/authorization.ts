import { Permission, groupHasPermission } from './permissions';
import { type Group, type Session } from './user';

/**
 * Everything the gate knows about the caller. Anonymous callers carry neither
 * a session nor a group.
 */
export interface AuthContext {
  session: Session | null;
  group: Group | null;
}

export const ANONYMOUS_CONTEXT: AuthContext = Object.freeze({ session: null, group: null });

export interface GatePolicy {
  allowAnonymousComments: boolean;
  allowSignups: boolean;
}

export const DEFAULT_GATE_POLICY: GatePolicy = Object.freeze({
  allowAnonymousComments: true,
  allowSignups: false,
});

export type Action =
  | 'article:create'
  | 'article:edit'
  | 'article:delete'
  | 'article:purge'
  | 'comment:create'
  | 'comment:edit'
  | 'comment:delete'
  | 'comment:purge'
  | 'user:create'
  | 'user:edit'
  | 'user:delete';

type ActionRule =
  | { kind: 'create'; permission: Permission; anonymous?: keyof GatePolicy }
  | { kind: 'owned'; own: Permission | 'owner'; foreign: Permission }
  | { kind: 'foreign-only'; foreign: Permission };

const ACTION_RULES: Record<Action, ActionRule> = {
  'article:create': { kind: 'create', permission: Permission.CreateArticle },
  'article:edit': { kind: 'owned', own: Permission.EditArticle, foreign: Permission.EditForeignArticle },
  'article:delete': { kind: 'owned', own: Permission.DeleteArticle, foreign: Permission.DeleteForeignArticle },
  'article:purge': { kind: 'foreign-only', foreign: Permission.DeleteForeignArticle },
  'comment:create': {
    kind: 'create',
    permission: Permission.CreateComment,
    anonymous: 'allowAnonymousComments',
  },
  'comment:edit': { kind: 'owned', own: Permission.EditComment, foreign: Permission.EditForeignComment },
  'comment:delete': { kind: 'owned', own: Permission.DeleteComment, foreign: Permission.DeleteForeignComment },
  'comment:purge': { kind: 'foreign-only', foreign: Permission.DeleteForeignComment },
  'user:create': { kind: 'create', permission: Permission.CreateUser, anonymous: 'allowSignups' },
  // Accounts always manage themselves; there is no own-user permission.
  'user:edit': { kind: 'owned', own: 'owner', foreign: Permission.EditForeignUser },
  'user:delete': { kind: 'owned', own: 'owner', foreign: Permission.DeleteForeignUser },
};

/**
 * Decides whether the caller may perform `action` on a resource owned by
 * `targetOwner` (`null` for guest comments and for creations). Pure: callers
 * perform the guarded effect themselves.
 */
export function isAuthorized(
  ctx: AuthContext,
  action: Action,
  targetOwner: string | null,
  policy: GatePolicy = DEFAULT_GATE_POLICY,
): boolean {
  const rule = ACTION_RULES[action];

  if (!ctx.session || !ctx.group) {
    return rule.kind === 'create' && rule.anonymous !== undefined && policy[rule.anonymous];
  }

  const { session, group } = ctx;

  switch (rule.kind) {
    case 'create':
      return groupHasPermission(group, rule.permission);
    case 'owned': {
      const owns = targetOwner !== null && targetOwner === session.userId;
      if (owns && (rule.own === 'owner' || groupHasPermission(group, rule.own))) {
        return true;
      }
      return groupHasPermission(group, rule.foreign);
    }
    case 'foreign-only':
      return groupHasPermission(group, rule.foreign);
  }
}

/** The signed-in user's id, or `null` for anonymous callers. */
export function actorId(ctx: AuthContext): string | null {
  return ctx.session?.userId ?? null;
}

export function hasPermission(ctx: AuthContext, permission: Permission): boolean {
  return ctx.group !== null && groupHasPermission(ctx.group, permission);
}
