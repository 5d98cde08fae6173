import Decimal from 'decimal.js';
import type { DecimalInput } from '../types/document.js';

/**
 * Decimal constructor for all monetary arithmetic. Isolated from the global
 * Decimal configuration so other users of decimal.js are unaffected.
 * Rounding policy: half-up, applied only at subtotal/tax/total boundaries.
 */
export const Money = Decimal.clone({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
});

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a decimal string or finite number. Returns null for anything that is
 * not a plain decimal literal (exponents, NaN, Infinity, empty strings).
 */
export function parseDecimal(input: DecimalInput | null | undefined): Decimal | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? new Money(input) : null;
  }
  if (typeof input !== 'string') return null;

  const trimmed = input.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  return new Money(trimmed);
}

export function roundMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** Two-decimal display form, e.g. "90.00". */
export function formatAmount(value: Decimal | string): string {
  return new Money(value).toFixed(2, Decimal.ROUND_HALF_UP);
}

/** Plain (non-exponential) exact string form, e.g. "0.1" or "100". */
export function exactString(value: Decimal): string {
  return value.toFixed();
}

export interface LineAmounts {
  quantity: Decimal;
  unitPrice: Decimal;
  discount: Decimal;
}

export interface DocumentTotals {
  lineTotals: Decimal[];
  subtotal: Decimal;
  taxTotal: Decimal;
  total: Decimal;
}

/**
 * lineTotal = quantity * unitPrice - discount, kept exact.
 * subtotal = round(sum(lineTotal)); taxTotal = round(subtotal * taxRate / 100);
 * total = subtotal + taxTotal.
 */
export function computeTotals(lines: LineAmounts[], taxRatePercent: Decimal): DocumentTotals {
  const lineTotals = lines.map((line) =>
    line.quantity.times(line.unitPrice).minus(line.discount),
  );

  const rawSubtotal = lineTotals.reduce<Decimal>((sum, value) => sum.plus(value), new Money(0));
  const subtotal = roundMoney(rawSubtotal);
  const taxTotal = roundMoney(subtotal.times(taxRatePercent).dividedBy(100));
  const total = subtotal.plus(taxTotal);

  return { lineTotals, subtotal, taxTotal, total };
}
