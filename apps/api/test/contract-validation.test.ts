/**
 * Contract Validation Tests
 *
 * Verifies that registerContractRoute enforces:
 * 1. Request validation (params, query, body) — rejects invalid input with 400
 * 2. Idempotency-Key presence on idempotent routes
 * 3. Response validation — malformed handler output produces 500 SERVER_RESPONSE_INVALID
 * 4. CirculationErrors map to their status, kind and retry hint
 * 5. Auth preHandlers are still invoked (contract adapter doesn't bypass auth)
 */

import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { z } from 'zod';
import { defineRoute } from '@circulation/contract';
import { registerContractRoute } from '../src/lib/contract-route.js';
import { conflict, timeout } from '../src/lib/errors.js';

// ---------------------------------------------------------------------------
// Test route contracts
// ---------------------------------------------------------------------------

const testGetRoute = defineRoute({
  method: 'GET' as const,
  path: '/test/:id',
  summary: 'Test GET',
  params: z.object({ id: z.string().uuid() }),
  query: z.object({ page: z.coerce.number().int().positive().optional() }),
  response: z.object({ name: z.string(), value: z.number().int() }),
});

const testPostRoute = defineRoute({
  method: 'POST' as const,
  path: '/test',
  summary: 'Test POST',
  body: z.object({ name: z.string().min(1), count: z.number().int() }),
  idempotent: true,
  response: z.object({ id: z.string(), name: z.string(), key: z.string() }),
});

const testDeleteRoute = defineRoute({
  method: 'DELETE' as const,
  path: '/test/:id',
  summary: 'Test DELETE',
  params: z.object({ id: z.string().uuid() }),
  response: 'void' as const,
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildApp() {
  const app = Fastify({ logger: false });
  return app;
}

const VALID_UUID = '00000000-0000-4000-8000-000000000001';

// ---------------------------------------------------------------------------
// Request validation tests
// ---------------------------------------------------------------------------

describe('Contract route — request validation', () => {
  it('rejects invalid params with 400', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => ({ name: 'x', value: 1 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: '/not-a-uuid' });
    expect(res.statusCode).toBe(400);
    const body = JSON.parse(res.body);
    expect(body.error.code).toBe('INVALID_REQUEST');
    expect(body.error.message).toBe('Invalid path parameters');
  });

  it('rejects invalid query with 400', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => ({ name: 'x', value: 1 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}?page=-1` });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error.message).toBe('Invalid query parameters');
  });

  it('rejects invalid body with 400 and field details', async () => {
    const app = buildApp();
    registerContractRoute(app, testPostRoute, '/test', {
      handler: async (_req, { idempotencyKey }) => ({ id: '1', name: 'x', key: idempotencyKey ?? '' }),
      successStatus: 201,
    });
    await app.ready();

    const res = await app.inject({
      method: 'POST',
      url: '/',
      headers: { 'idempotency-key': 'K1' },
      payload: { name: '', count: 'not-a-number' },
    });
    expect(res.statusCode).toBe(400);
    const body = JSON.parse(res.body);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(Object.keys(body.error.details.fieldErrors).sort()).toEqual(['count', 'name']);
  });

  it('passes parsed params and query to the handler', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async (_req, { params, query }) => ({ name: params.id, value: query.page ?? 0 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}?page=3` });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ data: { name: VALID_UUID, value: 3 } });
  });
});

// ---------------------------------------------------------------------------
// Idempotency-Key
// ---------------------------------------------------------------------------

describe('Contract route — Idempotency-Key', () => {
  async function buildPostApp() {
    const app = buildApp();
    let calls = 0;
    registerContractRoute(app, testPostRoute, '/test', {
      handler: async (_req, { body, idempotencyKey }) => {
        calls++;
        return { id: '1', name: body.name, key: idempotencyKey ?? '' };
      },
      successStatus: 201,
    });
    await app.ready();
    return { app, calls: () => calls };
  }

  it('requires the header before the handler runs', async () => {
    const { app, calls } = await buildPostApp();

    const res = await app.inject({ method: 'POST', url: '/', payload: { name: 'a', count: 1 } });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error).toEqual({
      code: 'IDEMPOTENCY_KEY_REQUIRED',
      message: 'Idempotency-Key header is required',
    });
    expect(calls()).toBe(0);
  });

  it('rejects a blank or oversized key', async () => {
    const { app } = await buildPostApp();

    const blank = await app.inject({
      method: 'POST', url: '/', headers: { 'idempotency-key': '   ' }, payload: { name: 'a', count: 1 },
    });
    expect(JSON.parse(blank.body).error.code).toBe('IDEMPOTENCY_KEY_REQUIRED');

    const long = await app.inject({
      method: 'POST', url: '/', headers: { 'idempotency-key': 'k'.repeat(257) }, payload: { name: 'a', count: 1 },
    });
    expect(long.statusCode).toBe(400);
    expect(JSON.parse(long.body).error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Idempotency-Key must be 256 characters or fewer',
    });
  });

  it('hands the key to the handler', async () => {
    const { app } = await buildPostApp();

    const res = await app.inject({
      method: 'POST', url: '/', headers: { 'idempotency-key': 'K-42' }, payload: { name: 'a', count: 1 },
    });
    expect(res.statusCode).toBe(201);
    expect(JSON.parse(res.body)).toEqual({ data: { id: '1', name: 'a', key: 'K-42' } });
  });
});

// ---------------------------------------------------------------------------
// Response validation tests
// ---------------------------------------------------------------------------

describe('Contract route — response validation', () => {
  it('returns 500 SERVER_RESPONSE_INVALID for malformed response', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      // value must be an integer
      handler: async () => ({ name: 'test', value: 1.5 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(500);
    const body = JSON.parse(res.body);
    expect(body.error.code).toBe('SERVER_RESPONSE_INVALID');
  });

  it('allows valid response through', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => ({ name: 'ok', value: 99 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(200);
    const body = JSON.parse(res.body);
    expect(body.data).toEqual({ name: 'ok', value: 99 });
  });

  it('sends 204 for void contract routes', async () => {
    const app = buildApp();
    registerContractRoute(app, testDeleteRoute, '/test', {
      handler: async () => {
        // handler does nothing; adapter sends 204
      },
    });
    await app.ready();

    const res = await app.inject({ method: 'DELETE', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(204);
  });
});

// ---------------------------------------------------------------------------
// Circulation errors
// ---------------------------------------------------------------------------

describe('Contract route — circulation errors', () => {
  it('maps a Conflict to 409 with kind and retryable', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => {
        throw conflict('COPY_UNAVAILABLE', 'Copy is not available');
      },
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(409);
    expect(res.headers['retry-after']).toBeUndefined();
    expect(JSON.parse(res.body)).toEqual({
      error: { code: 'COPY_UNAVAILABLE', message: 'Copy is not available', kind: 'CONFLICT', retryable: false },
    });
  });

  it('maps a Timeout to 503 with Retry-After', async () => {
    const app = buildApp();
    registerContractRoute(app, testGetRoute, '/test', {
      handler: async () => {
        throw timeout('LOCK_TIMEOUT', 'Timed out');
      },
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: `/${VALID_UUID}` });
    expect(res.statusCode).toBe(503);
    expect(res.headers['retry-after']).toBe('1');
    expect(JSON.parse(res.body).error).toEqual({
      code: 'LOCK_TIMEOUT', message: 'Timed out', kind: 'TIMEOUT', retryable: true,
    });
  });
});

// ---------------------------------------------------------------------------
// Auth independence tests
// ---------------------------------------------------------------------------

describe('Contract route — auth preHandlers', () => {
  it('invokes preHandler before contract validation', async () => {
    const app = buildApp();
    let authCalled = false;

    registerContractRoute(app, testGetRoute, '/test', {
      preHandler: [
        async (_req, reply) => {
          authCalled = true;
          return reply.status(401).send({ error: { code: 'UNAUTHENTICATED', message: 'Not authenticated' } });
        },
      ],
      handler: async () => ({ name: 'x', value: 1 }),
    });
    await app.ready();

    const res = await app.inject({ method: 'GET', url: '/not-a-uuid' });
    expect(authCalled).toBe(true);
    expect(res.statusCode).toBe(401);
  });
});
