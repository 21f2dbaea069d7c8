import { type Permission } from './permissions';

export interface User {
  /** Login name; doubles as the primary key. */
  id: string;
  passwordHash: string;
  name: string;
  email: string;
  groupId: string;
}

export interface Group {
  id: string;
  permissions: ReadonlySet<Permission>;
}

export interface Session {
  /** SHA-256 digest of the cookie token. */
  id: string;
  userId: string;
  expiresAt: Date;
}

export type PublicUser = Pick<User, 'id' | 'name'>;

export function toPublicUser(user: User): PublicUser {
  return { id: user.id, name: user.name };
}

export function isSessionExpired(session: Session, now: Date = new Date()): boolean {
  return session.expiresAt.getTime() <= now.getTime();
}
