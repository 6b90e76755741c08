/**
 * Error taxonomy for the download engine.
 *
 * Everything the engine raises extends DownloadError so callers can narrow on
 * `instanceof` or on the stable `code` string.
 */

export type DownloadErrorCode =
  | 'RESOLUTION_FAILED'
  | 'UNREACHABLE'
  | 'TRANSIENT_NETWORK'
  | 'INCOMPLETE_TRANSFER'
  | 'RESOURCE_CHANGED'
  | 'DESTINATION'
  | 'CANCELLED';

export class DownloadError extends Error {
  readonly code: DownloadErrorCode;

  constructor(code: DownloadErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DownloadError';
    this.code = code;
  }
}

/** No safe filename could be produced for the resource */
export class ResolutionError extends DownloadError {
  constructor(message: string) {
    super('RESOLUTION_FAILED', message);
    this.name = 'ResolutionError';
  }
}

/** The resource cannot be opened at all (bad URL, DNS failure, 404...) */
export class UnreachableError extends DownloadError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super('UNREACHABLE', message, { cause: options.cause });
    this.name = 'UnreachableError';
    this.url = url;
    this.status = options.status;
  }
}

/** Retryable mid-stream failure: connection reset, timeout, 5xx */
export class TransientNetworkError extends DownloadError {
  /** Set once the error is surfaced after exhausting retries */
  readonly attempts?: number;

  constructor(message: string, options: { attempts?: number; cause?: unknown } = {}) {
    super('TRANSIENT_NETWORK', message, { cause: options.cause });
    this.name = 'TransientNetworkError';
    this.attempts = options.attempts;
  }
}

export class IncompleteTransferError extends DownloadError {
  readonly expected: number | null;
  readonly actual: number;

  constructor(
    message: string,
    expected: number | null,
    actual: number,
    code: 'INCOMPLETE_TRANSFER' | 'RESOURCE_CHANGED' = 'INCOMPLETE_TRANSFER',
  ) {
    super(code, message);
    this.name = 'IncompleteTransferError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** Filesystem failure on the staging file or the destination */
export class DestinationError extends DownloadError {
  readonly path: string;
  readonly errno?: string;

  constructor(path: string, message: string, options: { errno?: string; cause?: unknown } = {}) {
    super('DESTINATION', message, { cause: options.cause });
    this.name = 'DestinationError';
    this.path = path;
    this.errno = options.errno;
  }
}

/**
 * Only thrown by the convenience helpers; the orchestrator itself reports a
 * cancellation as an outcome.
 */
export class CancelledError extends DownloadError {
  readonly stagingPath: string;

  constructor(stagingPath: string, reason: string) {
    super('CANCELLED', `Download cancelled (${reason})`);
    this.name = 'CancelledError';
    this.stagingPath = stagingPath;
  }
}

// Errors from Node's own modules can belong to another realm, so no `instanceof Error` here
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Wrap a filesystem error into a DestinationError, leaving engine errors as they are
 */
export function toDestinationError(error: unknown, filePath: string, action: string): DownloadError {
  if (error instanceof DownloadError) {
    return error;
  }
  const errno = isErrnoException(error) && typeof error.code === 'string' ? error.code : undefined;
  const reason = errorMessage(error);
  return new DestinationError(filePath, `Failed to ${action} ${filePath}: ${reason}`, {
    errno,
    cause: error,
  });
}
