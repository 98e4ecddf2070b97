/**
 * Contract Route Adapter
 *
 * Registers Fastify routes from contract definitions with automatic:
 * - params/query/body validation (Zod, before handler)
 * - Idempotency-Key extraction for routes marked idempotent
 * - response validation (Zod, after handler, before send)
 * - standardized error envelope for validation and circulation failures
 *
 * The contract is authoritative: a handler returns the unwrapped payload
 * typed by the route's response schema, and the adapter wraps it in { data }.
 */

import { FastifyInstance, FastifyRequest, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';
import type { ContractRoute } from '@circulation/contract';
import { z } from 'zod';
import { readIdempotencyKey } from '../plugins/idempotency.js';
import { fail, failWithError, ok } from '../utils/reply.js';
import { isCirculationError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Parsed<R, K extends 'params' | 'query' | 'body'> =
  R extends Record<K, infer S extends z.ZodTypeAny> ? z.output<S> : undefined;

/** Parsed and validated request data for one route. */
export interface ContractData<R extends ContractRoute> {
  params: Parsed<R, 'params'>;
  query: Parsed<R, 'query'>;
  body: Parsed<R, 'body'>;
  /** Present on idempotent routes; null elsewhere. */
  idempotencyKey: string | null;
}

export type ContractResult<R extends ContractRoute> =
  R extends { response: infer S extends z.ZodTypeAny } ? z.input<S> : void;

export type ContractHandler<R extends ContractRoute> = (
  request: FastifyRequest,
  data: ContractData<R>,
) => Promise<ContractResult<R>>;

export interface ContractRouteOptions<R extends ContractRoute> {
  /** Fastify preHandler hooks (auth, roles, etc.) */
  preHandler?: preHandlerAsyncHookHandler | preHandlerAsyncHookHandler[];
  handler: ContractHandler<R>;
  /**
   * Status code for success (default 200).
   * Use 201 for creation endpoints.
   */
  successStatus?: number;
}

// ---------------------------------------------------------------------------
// Path conversion
// ---------------------------------------------------------------------------

/**
 * Contract paths are relative to /api (e.g. `/circulation/copies/:copyId`).
 * Fastify routes are relative to their registration prefix, so strip it.
 */
function contractPathToFastify(contractPath: string, prefix: string): string {
  if (contractPath.startsWith(prefix)) {
    const relative = contractPath.slice(prefix.length);
    return relative || '/';
  }
  return contractPath;
}

type PartResult = { ok: true; data: z.output<z.ZodTypeAny> } | { ok: false; error: z.ZodError };

function parsePart(schema: z.ZodTypeAny | undefined, value: unknown): PartResult {
  if (!schema) return { ok: true, data: undefined };
  const result = schema.safeParse(value);
  return result.success ? { ok: true, data: result.data } : { ok: false, error: result.error };
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Register a single contract-authoritative route on a Fastify instance.
 *
 * @param prefix - Part of the contract path already covered by the plugin prefix.
 */
export function registerContractRoute<R extends ContractRoute>(
  fastify: FastifyInstance,
  route: R,
  prefix: string,
  options: ContractRouteOptions<R>,
): void {
  const { preHandler, handler, successStatus } = options;
  const preHandlerArray = preHandler
    ? (Array.isArray(preHandler) ? preHandler : [preHandler])
    : [];

  fastify.route({
    method: route.method,
    url: contractPathToFastify(route.path, prefix),
    preHandler: preHandlerArray,
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      const params = parsePart(route.params, request.params);
      if (!params.ok) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid path parameters', 400, params.error.flatten(), request.requestId);
      }
      const query = parsePart(route.query, request.query);
      if (!query.ok) {
        return fail(reply, 'INVALID_REQUEST', 'Invalid query parameters', 400, query.error.flatten(), request.requestId);
      }
      const body = parsePart(route.body, request.body);
      if (!body.ok) {
        return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, body.error.flatten(), request.requestId);
      }

      let idempotencyKey: string | null = null;
      if (route.idempotent) {
        const key = readIdempotencyKey(request);
        if (!key.ok) return fail(reply, key.code, key.message, 400, undefined, request.requestId);
        idempotencyKey = key.key;
      }

      let result: ContractResult<R>;
      try {
        result = await handler(request, {
          params: params.data,
          query: query.data,
          body: body.data,
          idempotencyKey,
        });
      } catch (err) {
        if (isCirculationError(err)) return failWithError(reply, err, request.requestId);
        throw err;
      }

      const responseSchema: z.ZodTypeAny | 'void' = route.response;
      if (responseSchema === 'void') {
        return reply.status(successStatus ?? 204).send();
      }

      const validation = responseSchema.safeParse(result);
      if (!validation.success) {
        request.log.error({
          code: 'SERVER_RESPONSE_INVALID',
          method: request.method,
          url: request.url,
          issues: validation.error.issues.map(i => ({ path: i.path, code: i.code, message: i.message })),
        }, 'Response failed contract validation');
        return fail(reply, 'SERVER_RESPONSE_INVALID', 'Response validation failed', 500, undefined, request.requestId);
      }
      return ok(reply, validation.data, successStatus ?? 200);
    },
  });
}
