/**
 * Circulation Routes — HTTP behaviour over the in-memory backend
 *
 * Envelopes, status codes, auth, Idempotency-Key handling, request
 * correlation and deadline-driven 503s.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Actor } from '@circulation/domain';
import { buildApp } from '../src/app.js';
import { createMemoryBackend, type MemoryBackend } from '../src/backend.js';
import { ADMIN, DAY_MS, ManualClock, SEED, T0, gate, member, testConfig } from './helpers.js';

interface SendOptions {
  as?: Actor;
  key?: string;
  requestId?: string;
  body?: Record<string, string>;
  headers?: Record<string, string>;
}

let clock: ManualClock;
let backend: MemoryBackend;
let app: FastifyInstance;

beforeEach(async () => {
  clock = new ManualClock();
  backend = createMemoryBackend(SEED, clock.now);
  app = await buildApp({ config: testConfig(), backend, now: clock.now, logger: false });
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

function send(method: 'GET' | 'POST', url: string, options: SendOptions = {}) {
  const headers: Record<string, string> = { ...options.headers };
  if (options.as) headers.authorization = `Bearer ${app.jwt.sign(options.as)}`;
  if (options.key) headers['idempotency-key'] = options.key;
  if (options.requestId) headers['x-request-id'] = options.requestId;
  return app.inject({ method, url: `/api/circulation${url}`, headers, payload: options.body });
}

const checkout = (copyId: string, userId: string, key: string, as: Actor = member(userId)) =>
  send('POST', '/checkouts', { as, key, body: { copyId, userId } });

const iso = (offsetMs: number) => new Date(T0.getTime() + offsetMs).toISOString();

describe('POST /checkouts', () => {
  it('creates a loan and answers 201', async () => {
    const res = await checkout('C7', 'U1', 'K1');

    expect(res.statusCode).toBe(201);
    const { loan } = res.json().data;
    expect(loan).toEqual({
      loanId: expect.any(String),
      copyId: 'C7',
      userId: 'U1',
      status: 'ACTIVE',
      checkedOutAt: iso(0),
      dueAt: iso(14 * DAY_MS),
      returnedAt: null,
      renewalCount: 0,
      overdue: false,
    });
  });

  it('replays the same loan for a retried key', async () => {
    const first = await checkout('C7', 'U1', 'K1');
    const retry = await checkout('C7', 'U1', 'K1');

    expect(retry.statusCode).toBe(201);
    expect(retry.json()).toEqual(first.json());
    expect(await backend.store.loans.findByUser('U1')).toHaveLength(1);
  });

  it('answers 409 with kind and retry hint when the copy is held', async () => {
    await checkout('C7', 'U1', 'K1');

    const res = await send('POST', '/checkouts', {
      as: member('U2'), key: 'K2', requestId: 'req-2', body: { copyId: 'C7', userId: 'U2' },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: {
        code: 'COPY_UNAVAILABLE',
        message: 'Copy is not available',
        kind: 'CONFLICT',
        retryable: false,
        requestId: 'req-2',
      },
    });
  });

  it('answers 409 IDEMPOTENCY_KEY_REUSED for a key bound to another copy', async () => {
    await checkout('C7', 'U1', 'K1');

    const res = await checkout('C1', 'U1', 'K1');
    expect(res.statusCode).toBe(409);
    expect(res.json().error.code).toBe('IDEMPOTENCY_KEY_REUSED');
  });

  it('requires an Idempotency-Key', async () => {
    const res = await send('POST', '/checkouts', {
      as: member('U1'), requestId: 'req-3', body: { copyId: 'C7', userId: 'U1' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: { code: 'IDEMPOTENCY_KEY_REQUIRED', message: 'Idempotency-Key header is required', requestId: 'req-3' },
    });
  });

  it('rejects unknown body fields', async () => {
    const res = await send('POST', '/checkouts', {
      as: member('U1'), key: 'K1', body: { copyId: 'C7', userId: 'U1', dueAt: '2030-01-01' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('answers 404 for an unknown copy', async () => {
    const res = await checkout('X99', 'U1', 'K5');
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toMatchObject({ code: 'COPY_NOT_FOUND', kind: 'NOT_FOUND', retryable: false });
  });

  it('answers 403 when a member checks out for someone else', async () => {
    const res = await checkout('C7', 'U2', 'K1', member('U1'));
    expect(res.statusCode).toBe(403);
    expect(res.json().error).toMatchObject({ code: 'NOT_SELF', kind: 'FORBIDDEN' });
  });

  it('answers 503 with Retry-After when the copy lock outlasts the deadline', async () => {
    const hold = gate();
    const blocker = backend.store.transaction(() => hold.opened, { lockTimeoutMs: 1000 });

    const res = await send('POST', '/checkouts', {
      as: member('U1'), key: 'K1', body: { copyId: 'C7', userId: 'U1' },
      headers: { 'x-request-deadline-ms': '20' },
    });
    hold.open();
    await blocker;

    expect(res.statusCode).toBe(503);
    expect(res.headers['retry-after']).toBe('1');
    expect(res.json().error).toMatchObject({ code: 'LOCK_TIMEOUT', kind: 'TIMEOUT', retryable: true });

    const retry = await checkout('C7', 'U1', 'K1');
    expect(retry.statusCode).toBe(201);
  });
});

describe('auth', () => {
  it('answers 401 without a token', async () => {
    const res = await send('POST', '/checkouts', {
      key: 'K1', requestId: 'req-4', body: { copyId: 'C7', userId: 'U1' },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: { code: 'UNAUTHENTICATED', message: 'Authentication required', requestId: 'req-4' },
    });
  });

  it('answers 401 for a token signed with another secret', async () => {
    const other = await buildApp({
      config: testConfig({ JWT_SECRET: 'other-secret' }),
      backend: createMemoryBackend(SEED, clock.now),
      now: clock.now,
      logger: false,
    });
    await other.ready();
    const token = other.jwt.sign(member('U1'));
    await other.close();

    const res = await app.inject({
      method: 'GET',
      url: '/api/circulation/copies/C7',
      headers: { authorization: `Bearer ${token}` },
    });
    expect(res.statusCode).toBe(401);
  });

  it('keeps admin routes from members', async () => {
    await checkout('C7', 'U1', 'K1');

    const res = await send('POST', '/copies/C7/lost', { as: member('U1'), key: 'L1' });
    expect(res.statusCode).toBe(403);
    expect(res.json().error).toMatchObject({
      code: 'ADMIN_ONLY',
      message: 'Required roles: ADMIN',
      kind: 'FORBIDDEN',
      retryable: false,
    });
  });
});

describe('return and renew', () => {
  it('returns a copy and reports the receipt', async () => {
    const loanId: string = (await checkout('C7', 'U1', 'K1')).json().data.loan.loanId;
    clock.advance(DAY_MS);

    const res = await send('POST', '/returns', { as: member('U1'), key: 'K3', body: { copyId: 'C7', userId: 'U1' } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      data: {
        receipt: {
          loanId,
          copyId: 'C7',
          userId: 'U1',
          checkedOutAt: iso(0),
          dueAt: iso(14 * DAY_MS),
          returnedAt: iso(DAY_MS),
          overdue: false,
        },
      },
    });

    const again = await send('POST', '/returns', { as: member('U1'), key: 'K4', body: { copyId: 'C7', userId: 'U1' } });
    expect(again.statusCode).toBe(409);
    expect(again.json().error.code).toBe('NO_ACTIVE_LOAN');
  });

  it('renews a loan', async () => {
    const loanId: string = (await checkout('C7', 'U1', 'K1')).json().data.loan.loanId;

    const res = await send('POST', `/loans/${loanId}/renew`, { as: member('U1'), key: 'R1' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: { loanId, dueAt: iso(28 * DAY_MS), renewalCount: 1 } });
  });

  it('rejects a malformed loan id', async () => {
    const res = await send('POST', '/loans/not-a-uuid/renew', { as: member('U1'), key: 'R1' });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('INVALID_REQUEST');
  });
});

describe('admin writes', () => {
  it('reports a loaned copy lost', async () => {
    const loanId: string = (await checkout('C1', 'U1', 'K1')).json().data.loan.loanId;

    const res = await send('POST', '/copies/C1/lost', { as: ADMIN, key: 'L1' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({
      copy: { copyId: 'C1', bookId: 'B1', status: 'LOST', state: 'UNAVAILABLE', currentLoanId: null },
      loan: {
        loanId,
        copyId: 'C1',
        userId: 'U1',
        status: 'LOST',
        checkedOutAt: iso(0),
        dueAt: iso(14 * DAY_MS),
        returnedAt: null,
        renewalCount: 0,
        overdue: false,
      },
    });
  });

  it('retires an available copy', async () => {
    const res = await send('POST', '/copies/C2/retire', { as: ADMIN, key: 'X1' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.copy).toEqual({
      copyId: 'C2', bookId: 'B1', status: 'RETIRED', state: 'UNAVAILABLE', currentLoanId: null,
    });
  });
});

describe('reads', () => {
  it('shows copy state and the active loan', async () => {
    const loanId: string = (await checkout('C7', 'U1', 'K1')).json().data.loan.loanId;

    const copy = await send('GET', '/copies/C7', { as: member('U2') });
    expect(copy.json().data.copy).toEqual({
      copyId: 'C7', bookId: 'B7', status: 'LOANED', state: 'HELD', currentLoanId: loanId,
    });

    const active = await send('GET', '/copies/C7/active-loan', { as: member('U2') });
    expect(active.json().data.loan.loanId).toBe(loanId);

    const none = await send('GET', '/copies/C1/active-loan', { as: member('U2') });
    expect(none.statusCode).toBe(404);
    expect(none.json().error.code).toBe('NO_ACTIVE_LOAN');
  });

  it('flags an active loan past its due date as overdue', async () => {
    await checkout('C7', 'U1', 'K1');
    clock.advance(15 * DAY_MS);

    const res = await send('GET', '/members/U1/loans', { as: member('U1') });
    expect(res.json().data.loans).toHaveLength(1);
    expect(res.json().data.loans[0]).toMatchObject({ status: 'ACTIVE', overdue: true });
  });

  it('lists loans only for the member themselves or an admin', async () => {
    await checkout('C7', 'U1', 'K1');

    const denied = await send('GET', '/members/U1/loans', { as: member('U2') });
    expect(denied.statusCode).toBe(403);
    expect(denied.json().error.code).toBe('NOT_SELF');

    const admin = await send('GET', '/members/U1/loans', { as: ADMIN });
    expect(admin.json().data.loans).toHaveLength(1);
  });

  it('shows the ledger entries of a loan', async () => {
    const loanId: string = (await checkout('C7', 'U1', 'K1')).json().data.loan.loanId;
    await send('POST', `/loans/${loanId}/renew`, { as: member('U1'), key: 'R1' });

    const res = await send('GET', `/loans/${loanId}/history`, { as: member('U1') });
    expect(res.json().data.entries).toEqual([
      {
        version: 1, entryType: 'CREATED', status: 'ACTIVE', dueAt: iso(14 * DAY_MS),
        returnedAt: null, renewalCount: 0, recordedAt: iso(0),
      },
      {
        version: 2, entryType: 'RENEWED', status: 'ACTIVE', dueAt: iso(28 * DAY_MS),
        returnedAt: null, renewalCount: 1, recordedAt: iso(0),
      },
    ]);
  });

  it('stamps audit events with the request id', async () => {
    const created = await send('POST', '/checkouts', {
      as: member('U1'), key: 'K1', requestId: 'req-checkout', body: { copyId: 'C7', userId: 'U1' },
    });
    expect(created.headers['x-request-id']).toBe('req-checkout');

    const res = await send('GET', '/audit?entityType=COPY&entityId=C7', { as: ADMIN });
    expect(res.statusCode).toBe(200);
    expect(res.json().data.events).toEqual([
      {
        eventId: expect.any(String),
        entityType: 'COPY',
        entityId: 'C7',
        fromState: 'AVAILABLE',
        toState: 'LOANED',
        actorUserId: 'U1',
        actorRole: 'MEMBER',
        correlationId: 'req-checkout',
        occurredAt: iso(0),
      },
    ]);

    const gaps = await send('GET', '/audit/gaps', { as: ADMIN });
    expect(gaps.json()).toEqual({ data: { gaps: [] } });
  });

  it('keeps the audit trail from members', async () => {
    const res = await send('GET', '/audit/gaps', { as: member('U1') });
    expect(res.statusCode).toBe(403);
  });
});

describe('startup', () => {
  it('warns that the configured in-memory store is for tests and local runs', async () => {
    const lines: Array<{ level: number; code?: string; msg?: string }> = [];
    const local = await buildApp({
      config: testConfig({ LOG_LEVEL: 'info' }),
      logger: { level: 'info', stream: { write: (line: string) => lines.push(JSON.parse(line)) } },
    });

    try {
      expect(lines.find(l => l.code === 'MEMORY_STORE')).toMatchObject({
        level: 40,
        msg: 'In-memory circulation store is for tests and local runs only: transactions run one at a time and state is lost on restart',
      });
    } finally {
      await local.close();
    }
  });

  it('does not warn when a backend is supplied', async () => {
    const lines: Array<{ code?: string }> = [];
    const local = await buildApp({
      config: testConfig(),
      backend: createMemoryBackend(SEED, clock.now),
      logger: { level: 'info', stream: { write: (line: string) => lines.push(JSON.parse(line)) } },
    });

    try {
      expect(lines.find(l => l.code === 'MEMORY_STORE')).toBeUndefined();
    } finally {
      await local.close();
    }
  });
});
