/**
 * Request Context
 *
 * Assigns every request:
 * - a correlation ID (inbound X-Request-Id, or a generated UUID), bound to the
 *   pino child logger, echoed on the response and stamped on audit events
 * - a deadline (now + X-Request-Deadline-Ms, clamped to the configured max)
 *   that bounds lock and idempotency waits
 *
 * Hooks are added on the instance passed in, so call this on the root
 * instance rather than registering it as an encapsulated plugin.
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';
import { type Deadline, deadlineAfter, resolveBudgetMs } from '../lib/deadline.js';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
    deadline: Deadline;
  }
}

export interface RequestContextOptions {
  deadline: { defaultMs: number; maxMs: number };
  now: () => Date;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function registerRequestContext(fastify: FastifyInstance, options: RequestContextOptions): void {
  fastify.decorateRequest('requestId', '');
  fastify.decorateRequest('deadline', 0);

  fastify.addHook('onRequest', (request: FastifyRequest, _reply: FastifyReply, done) => {
    const inbound = headerValue(request.headers['x-request-id']);
    const requestId = inbound && inbound.length <= 128 ? inbound : randomUUID();
    request.requestId = requestId;
    request.log = request.log.child({ requestId });

    const budgetMs = resolveBudgetMs(
      headerValue(request.headers['x-request-deadline-ms']),
      options.deadline.defaultMs,
      options.deadline.maxMs,
    );
    request.deadline = deadlineAfter(options.now(), budgetMs);
    done();
  });

  fastify.addHook('onSend', (request: FastifyRequest, reply: FastifyReply, payload: unknown, done) => {
    reply.header('X-Request-Id', request.requestId);
    done(null, payload);
  });
}
