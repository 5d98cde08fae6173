import { z } from 'zod';

export const DocumentKindSchema = z.enum(['invoice', 'quote', 'receipt']);

export type DocumentKind = z.infer<typeof DocumentKindSchema>;

/** Decimal inputs arrive either as strings ("12.50") or finite numbers. */
export type DecimalInput = string | number;

export interface LineItemInput {
  description: string;
  quantity: DecimalInput;
  unitPrice: DecimalInput;
  discount?: DecimalInput;
}

export interface ClientDetails {
  name: string;
  email?: string | null;
  address?: string | null;
  taxNumber?: string | null;
}

/**
 * A billing document as owned by the external document repository.
 * Its fields are mutable until the document is locked for sending.
 */
export interface BillingDocument {
  id: string;
  companyId: string;
  kind: DocumentKind;
  number: string;
  currency: string;
  /** Percentage, e.g. "8.875" */
  taxRate: DecimalInput;
  issueDate: string;
  dueDate?: string | null;
  client: ClientDetails;
  lineItems: LineItemInput[];
  notes?: string | null;
}

export interface CompanyBranding {
  companyId: string;
  companyName: string;
  addressLines: string[];
  email?: string | null;
  taxNumber?: string | null;
  /** Hex triple, e.g. "#6B46C1" */
  primaryColor: string;
  accentColor: string;
  fontFamily: string;
  /** Absolute path to a TTF/OTF file embedded instead of the standard family */
  fontPath?: string | null;
  /** Absolute path to a PNG or JPEG logo */
  logoPath?: string | null;
}

/**
 * Document repository owned by the surrounding application.
 * Lookups are scoped by company; a document of another company is absent.
 */
export interface DocumentRepository {
  getDocument(companyId: string, documentId: string): Promise<BillingDocument | null>;
  getCurrentCompanyBranding(companyId: string): Promise<CompanyBranding | null>;
}
