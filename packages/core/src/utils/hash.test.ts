import { describe, it, expect } from 'vitest';
import { canonicalJson, contentHash, sha256 } from './hash.js';

describe('canonicalJson', () => {
  it('sorts keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it('keeps array order', () => {
    expect(canonicalJson([{ b: 1, a: 2 }, 3])).toBe('[{"a":2,"b":1},3]');
  });
});

describe('contentHash', () => {
  it('produces consistent hashes for the same data', () => {
    const data = { number: 'INV-0001', total: '99.00', currency: 'USD' };
    expect(contentHash(data)).toBe(contentHash({ ...data }));
  });

  it('produces different hashes for different data', () => {
    expect(contentHash({ total: '99.00' })).not.toBe(contentHash({ total: '99.01' }));
  });

  it('is key-order independent, including nested objects', () => {
    const hash1 = contentHash({ b: 2, a: { y: 1, x: [1, 2] } });
    const hash2 = contentHash({ a: { x: [1, 2], y: 1 }, b: 2 });
    expect(hash1).toBe(hash2);
  });

  it('detects changes in nested values', () => {
    const hash1 = contentHash({ lines: [{ quantity: '1' }] });
    const hash2 = contentHash({ lines: [{ quantity: '2' }] });
    expect(hash1).not.toBe(hash2);
  });

  it('produces a valid SHA-256 hex string', () => {
    expect(contentHash({})).toMatch(/^[a-f0-9]{64}$/);
  });
});

describe('sha256', () => {
  it('hashes buffers and strings identically', () => {
    expect(sha256(Buffer.from('abc'))).toBe(sha256('abc'));
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
