import { describe, it, expect } from 'vitest';
import { generateDownloadToken, hashDownloadToken, isWellFormedToken } from './crypto.js';

describe('generateDownloadToken', () => {
  it('produces 43 base64url characters (256 bits)', () => {
    const token = generateDownloadToken();
    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(Buffer.from(token, 'base64url')).toHaveLength(32);
  });

  it('does not repeat', () => {
    const tokens = new Set(Array.from({ length: 200 }, () => generateDownloadToken()));
    expect(tokens.size).toBe(200);
  });
});

describe('isWellFormedToken', () => {
  it('accepts generated tokens', () => {
    expect(isWellFormedToken(generateDownloadToken())).toBe(true);
  });

  it('rejects wrong lengths and characters', () => {
    expect(isWellFormedToken('')).toBe(false);
    expect(isWellFormedToken('a'.repeat(42))).toBe(false);
    expect(isWellFormedToken('a'.repeat(44))).toBe(false);
    expect(isWellFormedToken(`${'a'.repeat(42)}/`)).toBe(false);
    expect(isWellFormedToken('../../etc/passwd')).toBe(false);
  });
});

describe('hashDownloadToken', () => {
  it('is a stable SHA-256 hex digest', () => {
    expect(hashDownloadToken('test-token')).toBe(hashDownloadToken('test-token'));
    expect(hashDownloadToken('test-token')).toMatch(/^[a-f0-9]{64}$/);
  });

  it('differs from the token itself', () => {
    const token = generateDownloadToken();
    expect(hashDownloadToken(token)).not.toContain(token);
  });
});
