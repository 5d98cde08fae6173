/**
 * Domain error taxonomy. Every error carries a stable `code` and the HTTP
 * status the server boundary responds with, so the error handler never has
 * to inspect error classes it does not know about.
 */
export class BillingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'BillingError';
  }
}

export class ValidationError extends BillingError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'VALIDATION_FAILED', 400);
    this.name = 'ValidationError';
  }
}

export class DocumentNotFoundError extends BillingError {
  constructor(documentId: string) {
    super(`Document ${documentId} not found`, 'DOCUMENT_NOT_FOUND', 404);
    this.name = 'DocumentNotFoundError';
  }
}

export class SnapshotNotFoundError extends BillingError {
  constructor(snapshotId: string) {
    super(`Snapshot ${snapshotId} not found`, 'SNAPSHOT_NOT_FOUND', 404);
    this.name = 'SnapshotNotFoundError';
  }
}

export class ArtifactNotFoundError extends BillingError {
  constructor(artifactId: string) {
    super(`Artifact ${artifactId} not found`, 'ARTIFACT_NOT_FOUND', 404);
    this.name = 'ArtifactNotFoundError';
  }
}

/** The artifact was consumed, retired or deleted before a link could be issued for it. */
export class ArtifactUnavailableError extends BillingError {
  constructor(artifactId: string) {
    super(`Artifact ${artifactId} is no longer live`, 'ARTIFACT_UNAVAILABLE', 409);
    this.name = 'ArtifactUnavailableError';
  }
}

/** Same message for unknown, malformed and purged tokens. */
export class CredentialNotFoundError extends BillingError {
  constructor() {
    super('Download link not found', 'TOKEN_NOT_FOUND', 404);
    this.name = 'CredentialNotFoundError';
  }
}

export class CredentialExpiredError extends BillingError {
  constructor() {
    super('Download link has expired', 'TOKEN_EXPIRED', 410);
    this.name = 'CredentialExpiredError';
  }
}

export class CredentialConsumedError extends BillingError {
  constructor() {
    super('Download link has already been used', 'TOKEN_CONSUMED', 410);
    this.name = 'CredentialConsumedError';
  }
}

export class InvalidTransitionError extends BillingError {
  constructor(
    public readonly transition: string,
    public readonly from: string,
    reason?: string,
  ) {
    super(
      `Cannot apply ${transition} to a document in status ${from}${reason ? `: ${reason}` : ''}`,
      'INVALID_TRANSITION',
      409,
    );
    this.name = 'InvalidTransitionError';
  }
}

/** A concurrent write won the race. Retrying the idempotent call observes the winner. */
export class IntegrityError extends BillingError {
  constructor(message: string) {
    super(message, 'INTEGRITY_CONFLICT', 409);
    this.name = 'IntegrityError';
  }
}

export class RenderError extends BillingError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message, 'RENDER_FAILED', 500);
    this.name = 'RenderError';
  }
}

export class RenderTimeoutError extends BillingError {
  constructor(timeoutMs: number) {
    super(`Rendering exceeded ${timeoutMs}ms`, 'RENDER_TIMEOUT', 503);
    this.name = 'RenderTimeoutError';
  }
}
