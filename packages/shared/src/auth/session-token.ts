import { randomBytes, createHash } from 'node:crypto';
import { type SessionTokens } from '@inkwell/domain';

const SESSION_TOKEN_BYTES = 24;

/**
 * Issues opaque session tokens. Only the SHA-256 digest of a token is stored,
 * so a leaked sessions table cannot be replayed as cookies.
 */
export class RandomSessionTokens implements SessionTokens {
  generate(): string {
    return randomBytes(SESSION_TOKEN_BYTES).toString('base64url');
  }

  hash(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }
}
