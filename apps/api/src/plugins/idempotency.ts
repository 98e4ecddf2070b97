/**
 * Idempotency-Key header
 *
 * Every circulation write requires an Idempotency-Key. The key is read and
 * checked here; deduplication itself happens in the Idempotency Coordinator,
 * which compares the operation fingerprint rather than the raw body.
 */

import { FastifyRequest } from 'fastify';

export const MAX_IDEMPOTENCY_KEY_LENGTH = 256;

export type IdempotencyKeyResult =
  | { ok: true; key: string }
  | { ok: false; code: 'IDEMPOTENCY_KEY_REQUIRED' | 'VALIDATION_ERROR'; message: string };

export function readIdempotencyKey(request: FastifyRequest): IdempotencyKeyResult {
  const header = request.headers['idempotency-key'];
  const key = Array.isArray(header) ? header[0] : header;

  if (!key || key.trim().length === 0) {
    return { ok: false, code: 'IDEMPOTENCY_KEY_REQUIRED', message: 'Idempotency-Key header is required' };
  }
  if (key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
    return {
      ok: false,
      code: 'VALIDATION_ERROR',
      message: `Idempotency-Key must be ${MAX_IDEMPOTENCY_KEY_LENGTH} characters or fewer`,
    };
  }
  return { ok: true, key };
}
