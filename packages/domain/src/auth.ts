export const RESERVED_USER_IDS = new Set([
  'admin',
  'administrator',
  'anonymous',
  'deleted',
  'guest',
  'me',
  'moderator',
  'root',
  'system',
]);

export const INITIAL_ADMIN_GROUP = 'admin';
export const DEFAULT_USER_GROUP = 'default';

export function isUserIdReserved(id: string): boolean {
  return RESERVED_USER_IDS.has(id.toLowerCase());
}

export function sessionExpiry(now: Date, ttlDays: number): Date {
  return new Date(now.getTime() + ttlDays * 24 * 60 * 60 * 1000);
}
