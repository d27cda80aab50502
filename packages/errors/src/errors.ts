import { AppError } from "./app-error.js";

interface DomainErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      details: options?.details,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: options?.details,
    });
    this.fields = fields;
  }
}

export class UnsupportedDocumentKindError extends AppError {
  public readonly kind: string;

  constructor(kind: string, options?: DomainErrorOptions) {
    super({
      message: `Unsupported document kind: ${kind}`,
      statusCode: 415,
      code: "UNSUPPORTED_DOCUMENT_KIND",
      details: { kind, ...options?.details },
    });
    this.kind = kind;
  }
}

/**
 * A supported document could not be parsed. `diagnostic` carries the parser's own message.
 */
export class ExtractionFailedError extends AppError {
  public readonly kind: string;
  public readonly diagnostic: string;

  constructor(kind: string, diagnostic: string, options?: DomainErrorOptions) {
    super({
      message: `Failed to extract text from ${kind} document: ${diagnostic}`,
      statusCode: 422,
      code: "EXTRACTION_FAILED",
      details: { kind, diagnostic, ...options?.details },
      cause: options?.cause,
    });
    this.kind = kind;
    this.diagnostic = diagnostic;
  }
}

export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, options?: DomainErrorOptions) {
    super({
      message: `Vector dimension mismatch: expected ${String(expected)}, got ${String(actual)}`,
      statusCode: 400,
      code: "DIMENSION_MISMATCH",
      details: { expected, actual, ...options?.details },
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidQueryError extends AppError {
  constructor(message = "Invalid query", options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "INVALID_QUERY",
      details: options?.details,
    });
  }
}

export class ProviderError extends AppError {
  public readonly provider: string;

  constructor(message = "Embedding provider error", provider: string, options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "PROVIDER_ERROR",
      details: { provider, ...options?.details },
      cause: options?.cause,
    });
    this.provider = provider;
  }
}

export class StoreError extends AppError {
  public readonly store: string;
  public readonly operation: string;

  constructor(message: string, store: string, operation: string, options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "STORE_ERROR",
      details: { store, operation, ...options?.details },
      cause: options?.cause,
    });
    this.store = store;
    this.operation = operation;
  }
}

/**
 * The delete-by-document loop stopped part way. Ids already removed stay removed,
 * so repeating the call finishes the job.
 */
export class PartialDeleteError extends AppError {
  public readonly documentId: string;
  public readonly namespace: string;
  public readonly deleted: number;

  constructor(documentId: string, namespace: string, deleted: number, options?: DomainErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super({
      message: `Delete of document "${documentId}" interrupted after ${String(deleted)} chunks${reason}`,
      statusCode: 502,
      code: "PARTIAL_DELETE",
      details: { documentId, namespace, deleted, ...options?.details },
      cause: options?.cause,
    });
    this.documentId = documentId;
    this.namespace = namespace;
    this.deleted = deleted;
  }
}

/**
 * Upstream failures (embedding provider, vector store, interrupted deletes) are safe
 * to retry; everything in the 4xx range is a problem with the request itself.
 */
export function isUpstreamError(error: unknown): boolean {
  return AppError.isAppError(error) && error.isUpstream;
}
