export interface RenderedArtifact {
  id: string;
  companyId: string;
  documentId: string;
  snapshotId: string;
  templateId: string;
  /** Hash of the branding the artifact was rendered with */
  brandingFingerprint: string;
  storagePath: string;
  byteSize: number;
  checksum: string;
  createdAt: string;
  expiresAt: string;
  consumedAt: string | null;
  deletedAt: string | null;
}

export interface DownloadCredential {
  /** SHA-256 of the token; the token itself is never stored */
  tokenHash: string;
  artifactId: string;
  issuedAt: string;
  expiresAt: string;
  consumedAt: string | null;
}
