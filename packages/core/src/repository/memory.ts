import type { BillingDocument, CompanyBranding, DocumentRepository } from '../types/document.js';

/**
 * Map-backed DocumentRepository for the dev server and tests.
 * Documents are keyed by company, so a lookup under another company misses.
 */
export class InMemoryDocumentRepository implements DocumentRepository {
  private readonly documents = new Map<string, BillingDocument>();
  private readonly branding = new Map<string, CompanyBranding>();

  constructor(seed?: { documents?: BillingDocument[]; branding?: CompanyBranding[] }) {
    for (const document of seed?.documents ?? []) this.saveDocument(document);
    for (const profile of seed?.branding ?? []) this.saveBranding(profile);
  }

  async getDocument(companyId: string, documentId: string): Promise<BillingDocument | null> {
    const document = this.documents.get(key(companyId, documentId));
    return document ? structuredClone(document) : null;
  }

  async getCurrentCompanyBranding(companyId: string): Promise<CompanyBranding | null> {
    const profile = this.branding.get(companyId);
    return profile ? structuredClone(profile) : null;
  }

  saveDocument(document: BillingDocument): void {
    this.documents.set(key(document.companyId, document.id), structuredClone(document));
  }

  saveBranding(profile: CompanyBranding): void {
    this.branding.set(profile.companyId, structuredClone(profile));
  }

  /** Apply an edit to a stored document, as the web form layer would. */
  updateDocument(
    companyId: string,
    documentId: string,
    update: (document: BillingDocument) => void,
  ): void {
    const document = this.documents.get(key(companyId, documentId));
    if (!document) throw new Error(`Unknown document ${companyId}/${documentId}`);
    update(document);
  }

  updateBranding(companyId: string, update: (profile: CompanyBranding) => void): void {
    const profile = this.branding.get(companyId);
    if (!profile) throw new Error(`Unknown company ${companyId}`);
    update(profile);
  }
}

function key(companyId: string, documentId: string): string {
  return `${companyId}/${documentId}`;
}
