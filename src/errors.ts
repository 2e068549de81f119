/**
 * Error taxonomy for loan processing.
 *
 * Transport, encoding and parse failures abort the current loan. Skips
 * (asset already downloaded, container already saved) are not errors and
 * are reported as outcome values instead.
 */

export type ErrorKind = 'transfer' | 'encoding' | 'parse' | 'config';

export class LoanpackError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LoanpackError';
    this.kind = kind;
  }
}

/**
 * HTTP error status or connection failure while talking to the vendor or content CDN
 */
export class TransferError extends LoanpackError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, cause?: unknown) {
    super('transfer', message, cause);
    this.name = 'TransferError';
    this.url = url;
    this.status = status;
  }
}

/**
 * External encoder exited with a non-zero code
 */
export class EncodingError extends LoanpackError {
  readonly exitCode: number | null;
  readonly command: string;

  constructor(message: string, command: string, exitCode: number | null, cause?: unknown) {
    super('encoding', message, cause);
    this.name = 'EncodingError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class ParseError extends LoanpackError {
  constructor(message: string, cause?: unknown) {
    super('parse', message, cause);
    this.name = 'ParseError';
  }
}

/**
 * Loan content that cannot be turned into a usable package, e.g. fixed-layout magazines
 */
export class UnsupportedFormatError extends ParseError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFormatError';
  }
}

export class ConfigError extends LoanpackError {
  constructor(message: string, cause?: unknown) {
    super('config', message, cause);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
