/**
 * Error taxonomy for document ingestion and the recommendation API.
 *
 * Every error carries a `kind` so callers can switch over it exhaustively
 * instead of chaining `instanceof` checks.
 */

export type IngestionErrorKind = 'unsupported_type' | 'file_too_large' | 'decode' | 'parse';

export type NetworkErrorKind = 'http' | 'connection' | 'timeout' | 'unexpected';

export class IngestionError extends Error {
  readonly kind: IngestionErrorKind;

  constructor(kind: IngestionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestionError';
    this.kind = kind;
  }
}

export class UnsupportedTypeError extends IngestionError {
  readonly mediaType: string;

  constructor(mediaType: string) {
    super('unsupported_type', `Unsupported file type: ${mediaType || 'unknown'}`);
    this.name = 'UnsupportedTypeError';
    this.mediaType = mediaType;
  }
}

export class FileTooLargeError extends IngestionError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super('file_too_large', `File size exceeds ${limit / (1024 * 1024)}MB limit`);
    this.name = 'FileTooLargeError';
    this.size = size;
    this.limit = limit;
  }
}

export class DecodeError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('decode', message, options);
    this.name = 'DecodeError';
  }
}

export class ParseError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('parse', message, options);
    this.name = 'ParseError';
  }
}

export class NetworkError extends Error {
  readonly kind: NetworkErrorKind;

  constructor(kind: NetworkErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
    this.kind = kind;
  }
}

export class HttpError extends NetworkError {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super('http', message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
  }
}

export class ConnectionError extends NetworkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
    this.name = 'ConnectionError';
  }
}

export class TimeoutError extends NetworkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('timeout', message, options);
    this.name = 'TimeoutError';
  }
}

export class UnexpectedError extends NetworkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('unexpected', message, options);
    this.name = 'UnexpectedError';
  }
}

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

/**
 * Get a printable message from anything thrown
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
