/**
 * API Envelope Tests
 *
 * Verifies:
 * 1. ok() / fail() / failWithError() produce correct envelopes
 * 2. Request correlation: X-Request-Id is echoed or generated
 * 3. The app error handler keeps framework errors inside the envelope
 */

import { describe, it, expect } from 'vitest';
import Fastify, { type FastifyReply } from 'fastify';
import { buildApp } from '../src/app.js';
import { createMemoryBackend } from '../src/backend.js';
import { conflict, internal, timeout } from '../src/lib/errors.js';
import { fail, failWithError, ok } from '../src/utils/reply.js';
import { ManualClock, SEED, T0, testConfig } from './helpers.js';

// ---------------------------------------------------------------------------
// 1. Reply helpers
// ---------------------------------------------------------------------------

async function replyWith(send: (reply: FastifyReply) => FastifyReply) {
  const app = Fastify({ logger: false });
  app.get('/', async (_request, reply) => send(reply));
  await app.ready();
  return app.inject({ method: 'GET', url: '/' });
}

describe('ok() helper', () => {
  it('wraps payload in { data } with status 200 by default', async () => {
    const res = await replyWith(reply => ok(reply, { items: [1, 2, 3] }));

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: { items: [1, 2, 3] } });
  });

  it('accepts custom status code', async () => {
    const res = await replyWith(reply => ok(reply, { id: '123' }, 201));
    expect(res.statusCode).toBe(201);
  });
});

describe('fail() helper', () => {
  it('wraps error in { error: { code, message } }', async () => {
    const res = await replyWith(reply => fail(reply, 'NOT_FOUND', 'Copy not found', 404));

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Copy not found' } });
  });

  it('includes details and request id when provided', async () => {
    const res = await replyWith(reply => fail(reply, 'VALIDATION_ERROR', 'Bad input', 400, { field: 'copyId' }, 'req-1'));

    expect(res.json()).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Bad input', details: { field: 'copyId' }, requestId: 'req-1' },
    });
  });

  it('defaults to 400 status', async () => {
    const res = await replyWith(reply => fail(reply, 'VALIDATION_ERROR', 'Bad'));
    expect(res.statusCode).toBe(400);
  });
});

describe('failWithError() helper', () => {
  it('maps each kind to its status', async () => {
    expect((await replyWith(reply => failWithError(reply, conflict('NO_ACTIVE_LOAN', 'x')))).statusCode).toBe(409);
    expect((await replyWith(reply => failWithError(reply, timeout('LOCK_TIMEOUT', 'x')))).statusCode).toBe(503);
    expect((await replyWith(reply => failWithError(reply, internal()))).statusCode).toBe(500);
  });

  it('marks internal failures retryable without leaking detail', async () => {
    const res = await replyWith(reply => failWithError(reply, internal(), 'req-9'));

    expect(res.json()).toEqual({
      error: {
        code: 'STORAGE_FAILURE',
        message: 'Storage failure',
        kind: 'INTERNAL',
        retryable: true,
        requestId: 'req-9',
      },
    });
    expect(res.headers['retry-after']).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// 2–3. App-level behaviour
// ---------------------------------------------------------------------------

async function testApp() {
  const clock = new ManualClock();
  const app = await buildApp({
    config: testConfig(),
    backend: createMemoryBackend(SEED, clock.now),
    now: clock.now,
    logger: false,
  });
  await app.ready();
  return app;
}

describe('request correlation', () => {
  it('echoes an inbound X-Request-Id', async () => {
    const app = await testApp();
    const res = await app.inject({ method: 'GET', url: '/api/health', headers: { 'x-request-id': 'req-abc' } });

    expect(res.headers['x-request-id']).toBe('req-abc');
    expect(res.json()).toEqual({ status: 'ok', timestamp: T0.toISOString() });
    await app.close();
  });

  it('generates an id when none is sent or the inbound one is too long', async () => {
    const app = await testApp();
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

    const none = await app.inject({ method: 'GET', url: '/api/health' });
    const long = await app.inject({ method: 'GET', url: '/api/health', headers: { 'x-request-id': 'r'.repeat(129) } });

    expect(none.headers['x-request-id']).toMatch(uuid);
    expect(long.headers['x-request-id']).toMatch(uuid);
    await app.close();
  });
});

describe('error handler', () => {
  it('turns malformed JSON into a VALIDATION_ERROR envelope', async () => {
    const app = await testApp();
    const res = await app.inject({
      method: 'POST',
      url: '/api/circulation/checkouts',
      headers: { 'content-type': 'application/json', 'x-request-id': 'req-json' },
      payload: '{"copyId":',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toMatchObject({ code: 'VALIDATION_ERROR', requestId: 'req-json' });
    await app.close();
  });

  it('turns an unsupported content type into a 415 envelope', async () => {
    const app = await testApp();
    const res = await app.inject({
      method: 'POST',
      url: '/api/circulation/checkouts',
      headers: { 'content-type': 'application/xml' },
      payload: '<checkout/>',
    });

    expect(res.statusCode).toBe(415);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
    await app.close();
  });
});
