/**
 * OpenAPI 3.1 document generator.
 *
 * Walks the contract registry and produces an OpenAPI document
 * using @asteasolutions/zod-to-openapi.
 */

import {
  OpenAPIRegistry,
  OpenApiGeneratorV31,
  extendZodWithOpenApi,
} from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import { contract } from '../routes/index.js';
import type { ContractRoute } from '../define-route.js';
import { ErrorEnvelope } from '../envelope.js';

// Extend Zod with .openapi() method
extendZodWithOpenApi(z);

type ResponseObject = { description: string; content?: Record<string, { schema: z.ZodTypeAny }> };

const IdempotencyHeaders = z.object({
  'idempotency-key': z.string().min(1).max(256),
  'x-request-deadline-ms': z.string().optional(),
});

/**
 * Convert a contract route path like `/loans/:loanId` to OpenAPI `/loans/{loanId}`.
 */
export function toOpenApiPath(path: string): string {
  return path.replace(/:([a-zA-Z0-9_]+)/g, '{$1}');
}

function errorResponse(description: string): ResponseObject {
  return {
    description,
    content: { 'application/json': { schema: ErrorEnvelope } },
  };
}

/**
 * Error responses every circulation write can produce.
 */
function writeErrorResponses(): Record<string, ResponseObject> {
  return {
    '400': errorResponse('Validation error or missing Idempotency-Key'),
    '403': errorResponse('Ineligible member or not the loan owner'),
    '404': errorResponse('Copy or loan not found'),
    '409': errorResponse('Copy unavailable, loan not active, or idempotency key reused'),
    '503': errorResponse('Deadline exceeded; retry with the same Idempotency-Key'),
  };
}

/**
 * Generate an OpenAPI 3.1 document from the contract registry.
 */
export function generateOpenApiDocument() {
  const registry = new OpenAPIRegistry();

  const groups = Object.entries(contract) as [string, Record<string, ContractRoute>][];

  for (const [groupName, routes] of groups) {
    for (const [routeName, route] of Object.entries(routes)) {
      const responses: Record<string, ResponseObject> = route.idempotent
        ? writeErrorResponses()
        : { '404': errorResponse('Not found') };

      if (route.response === 'void') {
        responses['204'] = { description: 'No content' };
      } else {
        responses['200'] = {
          description: 'Successful response',
          content: {
            'application/json': {
              schema: z.object({ data: route.response }),
            },
          },
        };
      }

      registry.registerPath({
        method: route.method.toLowerCase() as 'get' | 'post' | 'patch' | 'put' | 'delete',
        path: toOpenApiPath(route.path),
        operationId: `${groupName}.${routeName}`,
        summary: route.summary,
        request: {
          params: route.params instanceof z.ZodObject ? route.params : undefined,
          query: route.query instanceof z.ZodObject ? route.query : undefined,
          headers: route.idempotent ? IdempotencyHeaders : undefined,
          body: route.body
            ? { content: { 'application/json': { schema: route.body } }, required: true }
            : undefined,
        },
        responses,
      });
    }
  }

  const generator = new OpenApiGeneratorV31(registry.definitions);
  return generator.generateDocument({
    openapi: '3.1.0',
    info: {
      title: 'Circulation API',
      version: '1.0.0',
      description: 'Auto-generated from @circulation/contract route definitions.',
    },
    servers: [
      { url: 'http://localhost:3001/api', description: 'Local development' },
    ],
  });
}
