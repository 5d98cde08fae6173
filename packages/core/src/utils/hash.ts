import { createHash } from 'node:crypto';

/**
 * Serialize a value as JSON with object keys sorted at every depth,
 * so structurally equal values always produce the same string.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val && typeof val === 'object' && !Array.isArray(val)) {
      return Object.fromEntries(
        Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
      );
    }
    return val;
  });
}

/**
 * SHA-256 of the canonical JSON form of `data`.
 * Used to detect whether a draft's billable content changed since its
 * last snapshot, and to fingerprint branding.
 */
export function contentHash(data: unknown): string {
  return sha256(canonicalJson(data));
}

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}
