// Domain error hierarchy — no external imports.

/** Base class for domain-level errors. */
export abstract class DomainError extends Error {
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.cause = options?.cause;
  }
}

/**
 * A local or decoded remote tree is malformed: duplicate/ambiguous paths,
 * a broken navigation table or contents list, a missing index file.
 * Fatal: raised before any action runs.
 */
export class InvalidStructureError extends DomainError {
  constructor(message: string, options?: { cause?: unknown; path?: string }) {
    super(
      options?.path ? `${message} (path: ${options.path})` : message,
      { cause: options?.cause },
    );
  }
}

/** The index document could not be retrieved; reconciliation must not continue. */
export class RemoteUnavailableError extends DomainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
  }
}

/** A single call against the documentation server failed. */
export class ServerError extends DomainError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** The addressed remote document does not exist (anymore). */
export class DocumentNotFoundError extends ServerError {
  constructor(reference: string, options?: { cause?: unknown }) {
    super(`Document not found: ${reference}`, { cause: options?.cause, status: 404 });
  }
}

/** User inputs are missing or invalid. */
export class ConfigError extends DomainError {
  constructor(message: string, options?: { cause?: unknown; field?: string }) {
    super(
      options?.field ? `${message} (field: ${options.field})` : message,
      { cause: options?.cause },
    );
  }
}

/** git or the pull-request host refused an operation. */
export class VersionControlError extends DomainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
