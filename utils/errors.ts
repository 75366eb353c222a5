export type ErrorKind = 'input' | 'backend' | 'integrity' | 'cancelled';

export abstract class RagError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Input errors: deterministic, caller-fixable, never retried

export class ExtractionError extends RagError {
  readonly kind = 'input';
}

export class EmptyDocumentError extends RagError {
  readonly kind = 'input';

  constructor(pages: number) {
    super(`PDF has ${pages} page(s) but no extractable text (scanned documents are not supported)`);
  }
}

export class InvalidChunkConfigError extends RagError {
  readonly kind = 'input';
}

export class DuplicateDocumentError extends RagError {
  readonly kind = 'input';

  constructor(readonly filename: string) {
    super(`A document with filename '${filename}' has already been ingested`);
  }
}

export class InvalidCandidateSetError extends RagError {
  readonly kind = 'input';

  constructor() {
    super('At least one document id is required');
  }
}

export class InvalidRequestError extends RagError {
  readonly kind = 'input';
}

export class DocumentNotFoundError extends RagError {
  readonly kind = 'input';

  constructor(readonly documentId: string) {
    super(`Document '${documentId}' does not exist`);
  }
}

// Backend errors: transient, from remote calls

export class EmbeddingBackendError extends RagError {
  readonly kind = 'backend';
}

export class GenerationBackendError extends RagError {
  readonly kind = 'backend';
}

export class StorageError extends RagError {
  readonly kind = 'backend';
}

export class DimensionMismatchError extends RagError {
  readonly kind = 'integrity';

  constructor(readonly expected: number, readonly actual: number, context: string) {
    super(`Embedding dimension mismatch in ${context}: expected ${expected}, got ${actual}`);
  }
}

export class RequestCancelledError extends RagError {
  readonly kind = 'cancelled';

  constructor() {
    super('Request was cancelled by the caller');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export interface HttpErrorMapping {
  status: number;
  error: string;
  retryAfterSeconds?: number;
}

export function toHttpError(error: unknown): HttpErrorMapping {
  if (error instanceof DuplicateDocumentError) {
    return { status: 409, error: 'Duplicate document' };
  }
  if (error instanceof DocumentNotFoundError) {
    return { status: 404, error: 'Document not found' };
  }
  if (error instanceof RagError) {
    switch (error.kind) {
      case 'input':
        return { status: 400, error: 'Bad request' };
      case 'backend':
        return { status: 503, error: 'Service unavailable', retryAfterSeconds: 5 };
      case 'integrity':
        return { status: 500, error: 'Integrity error' };
      case 'cancelled':
        return { status: 499, error: 'Request cancelled' };
    }
  }
  return { status: 500, error: 'Internal error' };
}
