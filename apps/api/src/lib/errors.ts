/**
 * Circulation Errors
 *
 * Every failure surfaced by the engine is a CirculationError carrying the
 * taxonomy kind, a specific machine code and a caller-safe message.
 * Storage driver errors never reach the caller verbatim.
 */

import { type ErrorKind, isRetryableKind } from '@circulation/domain';

export type CirculationErrorCode =
  | 'COPY_NOT_FOUND'
  | 'LOAN_NOT_FOUND'
  | 'MEMBER_NOT_FOUND'
  | 'COPY_UNAVAILABLE'
  | 'COPY_NOT_LOANED'
  | 'COPY_NOT_AVAILABLE_FOR_RETIREMENT'
  | 'NO_ACTIVE_LOAN'
  | 'LOAN_NOT_ACTIVE'
  | 'LOAN_CHANGED'
  | 'RENEWAL_LIMIT_REACHED'
  | 'IDEMPOTENCY_KEY_REUSED'
  | 'MEMBER_INACTIVE'
  | 'LOAN_LIMIT_REACHED'
  | 'NOT_LOAN_OWNER'
  | 'NOT_SELF'
  | 'ADMIN_ONLY'
  | 'LOCK_TIMEOUT'
  | 'IDEMPOTENCY_WAIT_TIMEOUT'
  | 'IDEMPOTENCY_CLAIM_LOST'
  | 'STORAGE_FAILURE';

const HTTP_STATUS: Record<ErrorKind, number> = {
  NOT_FOUND: 404,
  CONFLICT: 409,
  FORBIDDEN: 403,
  TIMEOUT: 503,
  INTERNAL: 500,
  VALIDATION: 400,
};

export class CirculationError extends Error {
  readonly retryable: boolean;

  constructor(
    readonly kind: ErrorKind,
    readonly code: CirculationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CirculationError';
    this.retryable = isRetryableKind(kind);
  }

  get statusCode(): number {
    return HTTP_STATUS[this.kind];
  }
}

export function notFound(code: CirculationErrorCode, message: string): CirculationError {
  return new CirculationError('NOT_FOUND', code, message);
}

export function conflict(code: CirculationErrorCode, message: string): CirculationError {
  return new CirculationError('CONFLICT', code, message);
}

export function forbidden(code: CirculationErrorCode, message: string): CirculationError {
  return new CirculationError('FORBIDDEN', code, message);
}

export function timeout(code: CirculationErrorCode, message: string): CirculationError {
  return new CirculationError('TIMEOUT', code, message);
}

export function internal(message = 'Storage failure'): CirculationError {
  return new CirculationError('INTERNAL', 'STORAGE_FAILURE', message);
}

export function isCirculationError(err: unknown): err is CirculationError {
  return err instanceof CirculationError;
}

// ---------------------------------------------------------------------------
// PostgreSQL error translation
// ---------------------------------------------------------------------------

/** SQLSTATE codes the store translates. */
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_LOCK_NOT_AVAILABLE = '55P03';
export const PG_QUERY_CANCELED = '57014';

export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

/**
 * Map a storage-layer failure to the caller-facing taxonomy.
 * CirculationErrors pass through unchanged.
 */
export function translateStorageError(err: unknown): CirculationError {
  if (isCirculationError(err)) return err;
  const code = pgErrorCode(err);
  if (code === PG_LOCK_NOT_AVAILABLE || code === PG_QUERY_CANCELED) {
    return timeout('LOCK_TIMEOUT', 'Timed out waiting for the copy; retry with the same Idempotency-Key');
  }
  return internal();
}
