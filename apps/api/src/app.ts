/**
 * Circulation API - application factory
 * Fastify + Zod service around the allocation engine.
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import sensible from '@fastify/sensible';
import type { AppConfig } from './config.js';
import { type CirculationBackend, createMemoryBackend, createPostgresBackend } from './backend.js';
import { loadSeedData } from '../db/seed-data.js';
import { isCirculationError } from './lib/errors.js';
import { registerAuth } from './plugins/auth.js';
import { registerRequestContext } from './plugins/request-context.js';
import { circulationRoutes } from './routes/circulation.routes.js';
import { AllocationEngine } from './services/allocation.service.js';
import { AuditEmitter } from './services/audit.service.js';
import { LedgerCatalogDirectory } from './services/catalog-directory.js';
import { CirculationQueries } from './services/circulation-queries.js';
import { IdempotencyCoordinator } from './services/idempotency.service.js';
import { fail, failWithError } from './utils/reply.js';

export interface BuildAppOptions {
  config: AppConfig;
  /** Defaults to the backend of config.storeDriver. */
  backend?: CirculationBackend;
  now?: () => Date;
  /** Defaults to pino at config.logLevel, pretty-printed in development. */
  logger?: FastifyServerOptions['logger'];
  /** Fraction of writes that also purge expired idempotency records. */
  purgeSampleRate?: number;
}

function loggerOptions(config: AppConfig): FastifyServerOptions['logger'] {
  return {
    level: config.logLevel,
    transport: config.nodeEnv === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  };
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const now = options.now ?? (() => new Date());

  const fastify = Fastify({
    logger: options.logger ?? loggerOptions(config),
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id', 'Idempotency-Key', 'X-Request-Deadline-Ms'],
    exposedHeaders: ['X-Request-Id', 'Retry-After'],
  });

  await fastify.register(sensible);
  await registerAuth(fastify, config.jwtSecret);
  registerRequestContext(fastify, { deadline: config.deadline, now });

  // Centralized error handler: consistent envelope, no stack traces or driver messages
  fastify.setErrorHandler((error, request, reply) => {
    const requestId = request.requestId;
    if (isCirculationError(error)) {
      return failWithError(reply, error, requestId);
    }
    if (error.statusCode === 401) {
      return fail(reply, 'UNAUTHENTICATED', 'Authentication required', 401, undefined, requestId);
    }
    // Fastify validation errors (e.g., content-type, malformed JSON)
    if (error.validation || error.statusCode === 400 || error.statusCode === 415) {
      return fail(reply, 'VALIDATION_ERROR', error.message, error.statusCode ?? 400, undefined, requestId);
    }
    request.log.error({ err: error }, 'Unhandled error');
    return fail(reply, 'INTERNAL_ERROR', 'Internal server error', 500, undefined, requestId);
  });

  const backend = options.backend ?? (config.storeDriver === 'memory'
    ? createMemoryBackend(loadSeedData(), now)
    : createPostgresBackend(config, fastify.log));
  if (!options.backend && config.storeDriver === 'memory') {
    fastify.log.warn({ code: 'MEMORY_STORE' }, 'In-memory circulation store is for tests and local runs only: transactions run one at a time and state is lost on restart');
  }

  const coordinator = new IdempotencyCoordinator(backend.store.idempotency, {
    policy: config.idempotency,
    logger: fastify.log,
    now,
    purgeSampleRate: options.purgeSampleRate,
  });
  const engine = new AllocationEngine({
    store: backend.store,
    coordinator,
    audit: new AuditEmitter(backend.store.audit, fastify.log, now),
    catalog: new LedgerCatalogDirectory(backend.store.copies),
    policy: config.circulation,
    logger: fastify.log,
    now,
  });
  const queries = new CirculationQueries(backend.store, fastify.log);

  fastify.addHook('onClose', async () => {
    await backend.store.close();
  });

  fastify.get('/api/health', async () => ({ status: 'ok', timestamp: now().toISOString() }));

  await fastify.register(circulationRoutes, { prefix: '/api/circulation', engine, queries, now });

  return fastify;
}
