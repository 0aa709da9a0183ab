import crypto from 'crypto';

export * from './validation.js';

/**
 * Characters a session id may contain (base64url alphabet)
 */
export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Generate a session id.
 *
 * 32 random bytes and a timestamp salt go through SHA-256; the hex digest is
 * re-encoded as unpadded base64url, giving 86 URL-safe characters. The hash
 * keeps the random source from being recovered from an issued id.
 */
export function generateSessionId(): string {
  const randomBytes = crypto.randomBytes(32);
  const timestamp = Buffer.from(Date.now().toString(), 'utf8');

  const digest = crypto
    .createHash('sha256')
    .update(Buffer.concat([randomBytes, timestamp]))
    .digest('hex');

  return Buffer.from(digest, 'utf8').toString('base64url');
}

/**
 * Seconds since the epoch with millisecond precision, as used in stream frames
 */
export function epochSeconds(nowMs: number = Date.now()): number {
  return nowMs / 1000;
}

/**
 * Check for a plain JSON object (not null, not an array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
