import type { DocumentKind } from '../types/document.js';

export type NumberPrefixes = Record<DocumentKind, string>;

export const DEFAULT_NUMBER_PREFIXES: NumberPrefixes = {
  invoice: 'INV-',
  quote: 'QUO-',
  receipt: 'REC-',
};

/**
 * Next sequential document number for a company, e.g. INV-0042 → INV-0043.
 * A missing or unparsable latest number restarts the sequence at 1.
 */
export function nextDocumentNumber(
  kind: DocumentKind,
  latestNumber: string | null | undefined,
  prefixes: Partial<NumberPrefixes> = {},
): string {
  const prefix = prefixes[kind] || DEFAULT_NUMBER_PREFIXES[kind];

  let next = 1;
  if (latestNumber && latestNumber.startsWith(prefix)) {
    const digits = latestNumber.slice(prefix.length);
    if (/^\d+$/.test(digits)) {
      next = parseInt(digits, 10) + 1;
    }
  }

  return `${prefix}${String(next).padStart(4, '0')}`;
}
