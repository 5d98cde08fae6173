import type { ClientDetails, DocumentKind } from './document.js';

export interface SnapshotLineItem {
  position: number;
  description: string;
  quantity: string;
  unitPrice: string;
  discount: string;
  /** Exact `quantity * unitPrice - discount`, unrounded */
  lineTotal: string;
}

export interface BrandingSnapshot {
  companyName: string;
  addressLines: string[];
  email: string | null;
  taxNumber: string | null;
  primaryColor: string;
  accentColor: string;
  fontFamily: string;
  fontPath: string | null;
  logoPath: string | null;
}

/**
 * Immutable frozen copy of a document's billable content.
 * Superseded only by a new snapshot with a higher version.
 */
export interface DocumentSnapshot {
  id: string;
  documentId: string;
  companyId: string;
  version: number;
  kind: DocumentKind;
  number: string;
  currency: string;
  taxRate: string;
  issueDate: string;
  dueDate: string | null;
  client: ClientDetails;
  notes: string | null;
  lineItems: SnapshotLineItem[];
  branding: BrandingSnapshot;
  subtotal: string;
  taxTotal: string;
  total: string;
  contentHash: string;
  createdAt: string;
}
