export type ServiceErrorCode = 'NOT_FOUND' | 'IO_ERROR' | 'VALIDATION_ERROR';

/**
 * Base class for errors a service surfaces to its callers.
 * `code` is stable across releases and safe to switch on; `message` is not.
 */
export class ServiceError extends Error {
  readonly code: ServiceErrorCode;

  constructor(message: string, code: ServiceErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A record, or an entry inside one, does not exist. Callers often treat this as "create new". */
export class NotFoundError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NOT_FOUND', options);
  }
}

/** A path could not be read or written. The operation was aborted before persisting anything. */
export class IOError extends ServiceError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 'IO_ERROR', options);
    this.path = path;
  }
}

/** Input rejected before any filesystem access. */
export class ValidationError extends ServiceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, 'VALIDATION_ERROR', options);
    this.issues = issues;
  }
}

/** A record file exists but does not decode to a valid record. */
export class RecordFormatError extends ValidationError {
  readonly path: string;

  constructor(path: string, issues: string[], options?: { cause?: unknown }) {
    super(`Malformed record file at ${path}`, issues, options);
    this.path = path;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/** Wrap a filesystem failure in an IOError, keeping the original as `cause`. */
export function toIOError(error: unknown, action: string, path: string): IOError {
  if (error instanceof IOError) return error;
  const reason = isErrnoException(error) ? error.code : error instanceof Error ? error.message : String(error);
  return new IOError(`Failed to ${action} ${path}: ${reason}`, path, { cause: error });
}
