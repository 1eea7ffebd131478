export const MAX_ERROR_LENGTH = 200;

export class HttpError extends Error {
  status?: number;
  data?: unknown;

  constructor(message: string, status?: number, data?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.data = data;
  }
}

/** Submission rejected because its input holds nothing to check. */
export class ValidationError extends HttpError {
  constructor(message: string, data?: unknown) {
    super(message, 400, data);
    this.name = 'ValidationError';
  }
}

/** Submission rejected because a run of the same engine is in flight. */
export class ConflictError extends HttpError {
  constructor(message: string, data?: unknown) {
    super(message, 409, data);
    this.name = 'ConflictError';
  }
}

/**
 * A page could not be fetched: network failure, timeout, or a non-2xx status
 * once redirects were followed. Recorded per unit, never fails a batch.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly statusCode?: number;

  constructor(message: string, url: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

export function getErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/** Cuts by code point so a surrogate pair is never split. */
export function truncateMessage(message: string, maxLength = MAX_ERROR_LENGTH): string {
  const codePoints = Array.from(message);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('') : message;
}
