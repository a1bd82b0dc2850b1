import { createHash } from 'node:crypto';

const SAFE_USER_FIELD = /^[A-Za-z0-9_-]+$/;
const MAX_USER_FIELD_LENGTH = 64;

/**
 * Maps a session id onto the model provider's `user` field (abuse monitoring):
 * at most 64 characters from `[A-Za-z0-9_-]`. Anything else is hashed.
 *
 * @example
 * sanitizeUserField('session-1') // 'session-1'
 * sanitizeUserField('a'.repeat(100)) // 64-char sha256 hex digest
 */
export function sanitizeUserField(sessionId: string): string {
  const trimmed = sessionId.trim();
  if (!trimmed) {
    return 'anonymous';
  }
  if (trimmed.length <= MAX_USER_FIELD_LENGTH && SAFE_USER_FIELD.test(trimmed)) {
    return trimmed;
  }
  return createHash('sha256').update(trimmed).digest('hex');
}
