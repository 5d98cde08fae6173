import { randomBytes, createHash } from 'node:crypto';

/** 32 random bytes, base64url without padding */
const TOKEN_BYTES = 32;
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{43}$/;

/**
 * Generate an unguessable download token (256 bits of CSPRNG output).
 */
export function generateDownloadToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

export function isWellFormedToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

/**
 * Tokens are stored only as their SHA-256 digest, so a leaked database
 * does not hand out working download links.
 */
export function hashDownloadToken(token: string): string {
  return createHash('sha256').update(token, 'utf8').digest('hex');
}
