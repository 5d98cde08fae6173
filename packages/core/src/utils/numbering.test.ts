import { describe, it, expect } from 'vitest';
import { nextDocumentNumber } from './numbering.js';

describe('nextDocumentNumber', () => {
  it('starts each kind at 0001 with its default prefix', () => {
    expect(nextDocumentNumber('invoice', null)).toBe('INV-0001');
    expect(nextDocumentNumber('quote', undefined)).toBe('QUO-0001');
    expect(nextDocumentNumber('receipt', '')).toBe('REC-0001');
  });

  it('increments the latest number', () => {
    expect(nextDocumentNumber('invoice', 'INV-0041')).toBe('INV-0042');
  });

  it('grows past four digits', () => {
    expect(nextDocumentNumber('invoice', 'INV-9999')).toBe('INV-10000');
  });

  it('restarts at 1 when the latest number cannot be parsed', () => {
    expect(nextDocumentNumber('invoice', 'INV-ABC')).toBe('INV-0001');
    expect(nextDocumentNumber('invoice', 'QUO-0007')).toBe('INV-0001');
  });

  it('honours company prefixes', () => {
    expect(nextDocumentNumber('quote', 'Q2024/0009', { quote: 'Q2024/' })).toBe('Q2024/0010');
  });
});
