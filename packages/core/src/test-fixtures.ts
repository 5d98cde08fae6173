import { vi } from 'vitest';
import type { BillingDocument, CompanyBranding } from './types/document.js';
import type { Logger } from './utils/logger.js';

export const COMPANY_ID = 'acme';
export const OTHER_COMPANY_ID = 'globex';
export const DOCUMENT_ID = 'inv-1';

export function makeDocument(overrides?: Partial<BillingDocument>): BillingDocument {
  return {
    id: DOCUMENT_ID,
    companyId: COMPANY_ID,
    kind: 'invoice',
    number: 'INV-0001',
    currency: 'USD',
    taxRate: '10',
    issueDate: '2024-05-01',
    dueDate: '2024-05-31',
    client: {
      name: 'Wayne Enterprises',
      email: 'ap@wayne.test',
      address: '1007 Mountain Drive',
    },
    lineItems: [
      { description: 'Consulting', quantity: '2', unitPrice: '50.00' },
      { description: 'Hosting', quantity: '1', unitPrice: '30.00' },
    ],
    notes: 'Thank you for your business.',
    ...overrides,
  };
}

export function makeBranding(overrides?: Partial<CompanyBranding>): CompanyBranding {
  return {
    companyId: COMPANY_ID,
    companyName: 'Acme Billing Ltd',
    addressLines: ['1 Main Street', 'Springfield'],
    email: 'billing@acme.test',
    taxNumber: 'VAT-0001',
    primaryColor: '#6B46C1',
    accentColor: '#F6AD55',
    fontFamily: 'Helvetica',
    fontPath: null,
    logoPath: null,
    ...overrides,
  };
}

/** Mutable clock for components that take `now: () => Date`. */
export function makeClock(start = '2024-05-01T10:00:00.000Z') {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
    set(iso: string) {
      current = new Date(iso);
    },
  };
}

/** Logger whose methods are spies. */
export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}
