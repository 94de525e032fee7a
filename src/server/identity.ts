/**
 * Content identity: dedup digests and shareable public ids.
 *
 * The two values are independent of each other and of the internal theme id,
 * so leaking one never reveals the others.
 */

import crypto from 'crypto';

const PUBLIC_ID_BYTES = 16;

/** Lowercase hex SHA-256 of the raw uploaded bytes. */
export function computeContentHash(bytes: Uint8Array): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

/** 22-character URL-safe random id. */
export function generatePublicId(): string {
  return crypto.randomBytes(PUBLIC_ID_BYTES).toString('base64url');
}

export const PUBLIC_ID_PATTERN = /^[A-Za-z0-9_-]{22}$/;

export function isWellFormedPublicId(value: string): boolean {
  return PUBLIC_ID_PATTERN.test(value);
}
