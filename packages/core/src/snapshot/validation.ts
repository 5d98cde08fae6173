import type Decimal from 'decimal.js';
import type { BillingDocument, DecimalInput } from '../types/document.js';
import { ValidationError } from '../errors/index.js';
import { Money, parseDecimal } from './money.js';

export interface ValidatedLine {
  description: string;
  quantity: Decimal;
  unitPrice: Decimal;
  discount: Decimal;
}

export interface ValidatedDocument {
  lines: ValidatedLine[];
  taxRate: Decimal;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const CURRENCY = /^[A-Z]{3}$/;

/**
 * Check the lock preconditions and parse every decimal field.
 * Collects all issues before failing so callers can fix a form in one pass.
 */
export function validateDocument(document: BillingDocument): ValidatedDocument {
  const issues: string[] = [];

  const decimal = (value: DecimalInput | undefined, path: string): Decimal | null => {
    const parsed = parseDecimal(value);
    if (!parsed) {
      issues.push(`${path}: must be a decimal number`);
      return null;
    }
    if (parsed.isNegative() && !parsed.isZero()) {
      issues.push(`${path}: must not be negative`);
      return null;
    }
    return parsed;
  };

  if (!document.number.trim()) issues.push('number: is required');
  if (!CURRENCY.test(document.currency)) issues.push('currency: must be a three-letter ISO code');
  if (!ISO_DATE.test(document.issueDate)) issues.push('issueDate: must be YYYY-MM-DD');
  if (document.dueDate && !ISO_DATE.test(document.dueDate)) {
    issues.push('dueDate: must be YYYY-MM-DD');
  }
  if (!document.client.name.trim()) issues.push('client.name: is required');

  const taxRate = decimal(document.taxRate, 'taxRate');
  if (taxRate && taxRate.greaterThan(100)) {
    issues.push('taxRate: must not exceed 100');
  }

  if (document.lineItems.length === 0) {
    issues.push('lineItems: at least one line item is required');
  }

  const lines: ValidatedLine[] = [];
  document.lineItems.forEach((item, index) => {
    const path = `lineItems[${index}]`;
    if (!item.description.trim()) issues.push(`${path}.description: is required`);

    const quantity = decimal(item.quantity, `${path}.quantity`);
    const unitPrice = decimal(item.unitPrice, `${path}.unitPrice`);
    const discount = decimal(item.discount ?? 0, `${path}.discount`);
    if (!quantity || !unitPrice || !discount) return;

    if (discount.greaterThan(quantity.times(unitPrice))) {
      issues.push(`${path}.discount: exceeds the line gross amount`);
      return;
    }

    lines.push({ description: item.description.trim(), quantity, unitPrice, discount });
  });

  if (issues.length > 0 || !taxRate) {
    throw new ValidationError(`Document ${document.id} cannot be locked`, issues);
  }

  return { lines, taxRate: new Money(taxRate) };
}
