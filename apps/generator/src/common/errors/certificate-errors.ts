import type { ErrorKind } from '@certgen/shared';

/**
 * Base class for every failure the pipeline knows how to classify.
 * Row-scoped errors fail a single roster row; the others abort the run.
 */
export abstract class CertificateError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly rowScoped: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing required columns, unreadable template or roster, invalid environment */
export class ConfigurationError extends CertificateError {
  readonly kind = 'ConfigurationError';
  readonly rowScoped = false;
}

export class FolderCreationError extends CertificateError {
  readonly kind = 'FolderCreationError';
  readonly rowScoped = true;

  constructor(
    readonly companyName: string,
    cause: unknown,
  ) {
    super(`Could not resolve folder for company "${companyName}": ${describeCause(cause)}`, { cause });
  }
}

export class TemplateLoadError extends CertificateError {
  readonly kind = 'TemplateLoadError';
  readonly rowScoped = true;
}

export class RenderConversionError extends CertificateError {
  readonly kind = 'RenderConversionError';
  readonly rowScoped = true;
}

export class UploadError extends CertificateError {
  readonly kind = 'UploadError';
  readonly rowScoped = true;

  constructor(
    readonly fileName: string,
    cause: unknown,
  ) {
    super(`Upload of ${fileName} failed: ${describeCause(cause)}`, { cause });
  }
}

export class StatusWriteError extends CertificateError {
  readonly kind = 'StatusWriteError';
  readonly rowScoped = true;

  constructor(
    readonly sheetRow: number,
    cause: unknown,
  ) {
    super(`Status write-back for sheet row ${sheetRow} failed: ${describeCause(cause)}`, { cause });
  }
}

/**
 * The certificate reached the store but the roster still says pending.
 * An operator has to mark the row by hand, or the next run uploads it again
 * (over the same file name).
 */
export class ReconciliationWarning {
  readonly kind = 'ReconciliationWarning';
  readonly message: string;

  constructor(
    readonly fileName: string,
    readonly sheetRow: number,
  ) {
    this.message =
      `${fileName} was uploaded but sheet row ${sheetRow} is still pending; ` +
      'mark it done manually before the next run';
  }
}

/** Transport-level failure talking to the remote store */
export class StoreRequestError extends Error {
  constructor(
    readonly operation: string,
    message: string,
    readonly status: number | undefined,
    readonly transient: boolean,
    options?: { cause?: unknown },
  ) {
    super(`${operation}: ${message}`, options);
    this.name = 'StoreRequestError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return 'unknown error';
}

export function isCertificateError(err: unknown): err is CertificateError {
  return err instanceof CertificateError;
}
