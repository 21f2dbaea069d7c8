import { type Group } from './user';

export enum Permission {
  All = 'all',
  CreateArticle = 'create_article',
  EditArticle = 'edit_article',
  DeleteArticle = 'delete_article',
  EditForeignArticle = 'edit_foreign_article',
  DeleteForeignArticle = 'delete_foreign_article',
  CreateComment = 'create_comment',
  EditComment = 'edit_comment',
  DeleteComment = 'delete_comment',
  EditForeignComment = 'edit_foreign_comment',
  DeleteForeignComment = 'delete_foreign_comment',
  CreateUser = 'create_user',
  EditForeignUser = 'edit_foreign_user',
  DeleteForeignUser = 'delete_foreign_user',
}

const PERMISSION_VALUES: ReadonlySet<string> = new Set(Object.values(Permission));

export function isPermission(value: string): value is Permission {
  return PERMISSION_VALUES.has(value);
}

/** `All` grants every permission. */
export function groupHasPermission(group: Group, permission: Permission): boolean {
  return group.permissions.has(Permission.All) || group.permissions.has(permission);
}

/**
 * Converts stored permission names into a set, rejecting anything outside the
 * vocabulary.
 */
export function parsePermissions(values: readonly string[]): Set<Permission> {
  const result = new Set<Permission>();
  for (const value of values) {
    if (!isPermission(value)) {
      throw new Error(`Unknown permission '${value}'`);
    }
    result.add(value);
  }
  return result;
}
