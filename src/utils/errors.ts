/**
 * Error taxonomy
 *
 * Fatal errors end the run; the others are contained where they occur.
 */

export type NewsDigestErrorCode =
  | 'SOURCE_FETCH'
  | 'TRANSLATION'
  | 'STORE_IO'
  | 'DELIVERY_CONFIG'
  | 'DELIVERY_TRANSPORT';

export class NewsDigestError extends Error {
  readonly code: NewsDigestErrorCode;
  readonly fatal: boolean;

  constructor(code: NewsDigestErrorCode, message: string, fatal: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NewsDigestError';
    this.code = code;
    this.fatal = fatal;
  }
}

export class SourceFetchError extends NewsDigestError {
  readonly sourceName: string;

  constructor(sourceName: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_FETCH', message, false, options);
    this.name = 'SourceFetchError';
    this.sourceName = sourceName;
  }
}

export class TranslationError extends NewsDigestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSLATION', message, false, options);
    this.name = 'TranslationError';
  }
}

export class StoreIOError extends NewsDigestError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('STORE_IO', message, true, options);
    this.name = 'StoreIOError';
    this.path = path;
  }
}

export class DeliveryConfigError extends NewsDigestError {
  constructor(message: string) {
    super('DELIVERY_CONFIG', message, true);
    this.name = 'DeliveryConfigError';
  }
}

export class DeliveryTransportError extends NewsDigestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DELIVERY_TRANSPORT', message, true, options);
    this.name = 'DeliveryTransportError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
