import type { ProviderKind } from './types';

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT_ERROR'
  | 'AUTH_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'EMPTY_RESPONSE_ERROR'
  | 'PARSE_ERROR'
  | 'PDF_RENDER_ERROR'
  | 'RENAME_ERROR';

export class InvoiceLedgerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InvoiceLedgerError';
  }

  /** Lowercase form of the code, used as the prefix of record error entries */
  get tag(): string {
    return this.code.toLowerCase();
  }
}

interface ProviderErrorOptions {
  provider?: ProviderKind;
  status?: number;
  cause?: unknown;
}

/**
 * Failure raised while talking to a vision provider.
 * `message` keeps the provider's own wording for diagnostics.
 */
export class ProviderError extends InvoiceLedgerError {
  public readonly provider?: ProviderKind;
  public readonly status?: number;

  constructor(message: string, code: ErrorCode, retryable: boolean, options: ProviderErrorOptions = {}) {
    super(message, code, retryable, { cause: options.cause });
    this.name = 'ProviderError';
    this.provider = options.provider;
    this.status = options.status;
  }
}

export class NetworkError extends ProviderError {
  constructor(message = 'Network request failed', options: ProviderErrorOptions = {}) {
    super(message, 'NETWORK_ERROR', true, options);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends ProviderError {
  constructor(message = 'Request timed out', options: ProviderErrorOptions = {}) {
    super(message, 'TIMEOUT_ERROR', true, options);
    this.name = 'TimeoutError';
  }
}

export class AuthError extends ProviderError {
  constructor(message = 'Authentication rejected', options: ProviderErrorOptions = {}) {
    super(message, 'AUTH_ERROR', false, options);
    this.name = 'AuthError';
  }
}

export class RateLimitError extends ProviderError {
  /** Delay requested by the server through Retry-After, when present */
  public readonly retryAfterMs?: number;

  constructor(
    message = 'Rate limit exceeded',
    options: ProviderErrorOptions & { retryAfterMs?: number } = {}
  ) {
    super(message, 'RATE_LIMIT_ERROR', true, options);
    this.name = 'RateLimitError';
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class EmptyResponseError extends ProviderError {
  constructor(message = 'Provider returned no content', options: ProviderErrorOptions = {}) {
    super(message, 'EMPTY_RESPONSE_ERROR', true, options);
    this.name = 'EmptyResponseError';
  }
}

/** Invalid or incomplete configuration. Fatal for a whole batch. */
export class ConfigError extends InvoiceLedgerError {
  constructor(message = 'Invalid configuration', options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', false, options);
    this.name = 'ConfigError';
  }
}

export class ParseError extends InvoiceLedgerError {
  constructor(message = 'Unparseable model output', options?: { cause?: unknown }) {
    super(message, 'PARSE_ERROR', false, options);
    this.name = 'ParseError';
  }
}

export class PdfRenderError extends InvoiceLedgerError {
  constructor(
    public readonly pdfPath: string,
    message = 'PDF rendering failed',
    options?: { cause?: unknown }
  ) {
    super(message, 'PDF_RENDER_ERROR', false, options);
    this.name = 'PdfRenderError';
  }
}

export class RenameError extends InvoiceLedgerError {
  constructor(
    public readonly sourcePath: string,
    public readonly targetPath: string,
    message = 'Rename failed',
    options?: { cause?: unknown }
  ) {
    super(message, 'RENAME_ERROR', false, options);
    this.name = 'RenameError';
  }
}

/** Errors an adapter may reject with */
export type ProviderFailure =
  | NetworkError
  | TimeoutError
  | AuthError
  | RateLimitError
  | EmptyResponseError
  | ConfigError;

export function isProviderFailure(error: unknown): error is ProviderFailure {
  return error instanceof ProviderError || error instanceof ConfigError;
}

/** `<tag>: <message>`, the form stored in InvoiceRecord.errors */
export function describeError(error: InvoiceLedgerError): string {
  return `${error.tag}: ${error.message}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** errno-style code of a Node system error (ENOENT, EEXIST, ...) */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
