/**
 * Standardized API Reply Helpers
 *
 * All API responses use a consistent envelope:
 *   Success: { data: <payload> }
 *   Error:   { error: { code, message, kind?, retryable?, requestId?, details? } }
 *
 * Usage:
 *   return ok(reply, { loan });
 *   return ok(reply, { loan }, 201);
 *   return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, zodErrors, request.requestId);
 *   return failWithError(reply, err, request.requestId);
 */

import { FastifyReply } from 'fastify';
import type { ErrorEnvelope } from '@circulation/contract';
import type { CirculationError } from '../lib/errors.js';

/** Seconds a client should wait before retrying a TIMEOUT. */
export const RETRY_AFTER_SECONDS = 1;

/**
 * Send a success response wrapped in { data }.
 */
export function ok<T>(reply: FastifyReply, data: T, statusCode = 200): FastifyReply {
  return reply.status(statusCode).send({ data });
}

/**
 * Send an error response wrapped in { error: { code, message, details? } }.
 */
export function fail(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 400,
  details?: unknown,
  requestId?: string,
): FastifyReply {
  const body: ErrorEnvelope = {
    error: { code, message },
  };
  if (details !== undefined) {
    body.error.details = details;
  }
  if (requestId) {
    body.error.requestId = requestId;
  }
  return reply.status(statusCode).send(body);
}

/**
 * Send a CirculationError with its kind and retry hint.
 * TIMEOUT carries Retry-After; retrying with the same Idempotency-Key is safe.
 */
export function failWithError(
  reply: FastifyReply,
  err: CirculationError,
  requestId?: string,
): FastifyReply {
  if (err.kind === 'TIMEOUT') {
    reply.header('Retry-After', String(RETRY_AFTER_SECONDS));
  }
  const body: ErrorEnvelope = {
    error: {
      code: err.code,
      message: err.message,
      kind: err.kind,
      retryable: err.retryable,
    },
  };
  if (requestId) {
    body.error.requestId = requestId;
  }
  return reply.status(err.statusCode).send(body);
}
