import type { BackendAttempt } from './types.js';

export class BibsiftError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'BibsiftError';
  }
}

export class BackendFailureError extends BibsiftError {
  constructor(
    message: string,
    public readonly backend: string,
    details?: Record<string, unknown>
  ) {
    super(message, { backend, ...details });
    this.name = 'BackendFailureError';
  }
}

export class NoTextExtractedError extends BibsiftError {
  constructor(
    documentPath: string,
    public readonly attempts: BackendAttempt[]
  ) {
    super(`No text could be extracted from ${documentPath}`, { documentPath, attempts });
    this.name = 'NoTextExtractedError';
  }
}

export class MalformedInputError extends BibsiftError {
  constructor(message = 'Input text is empty or whitespace-only.') {
    super(message);
    this.name = 'MalformedInputError';
  }
}

export class NoReferencesFoundError extends BibsiftError {
  constructor(details?: Record<string, unknown>) {
    super('No reference candidates were found in the document text.', details);
    this.name = 'NoReferencesFoundError';
  }
}

export class DocumentNotFoundError extends BibsiftError {
  constructor(documentPath: string) {
    super(`Document not found: ${documentPath}`, { documentPath });
    this.name = 'DocumentNotFoundError';
  }
}

export class DocumentTooLargeError extends BibsiftError {
  constructor(documentPath: string, sizeMb: number, maxSizeMb: number) {
    super(`File too large: ${sizeMb.toFixed(1)}MB (max: ${maxSizeMb}MB)`, { documentPath, sizeMb, maxSizeMb });
    this.name = 'DocumentTooLargeError';
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
