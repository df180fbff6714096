import crypto from 'crypto';

export const HASH_ALGORITHM = 'sha256';

/**
 * Compute SHA-256 hex digest truncated to 12 chars for cache records.
 */
export function contentHash(input: string | Buffer): string {
  const h = crypto.createHash(HASH_ALGORITHM).update(input).digest('hex');
  return h.slice(0, 12);
}

/**
 * Hash a list of parts. Parts are JSON encoded so that ["ab", "c"] and
 * ["a", "bc"] never collide.
 */
export function digestParts(parts: readonly unknown[]): string {
  return contentHash(JSON.stringify(parts));
}
