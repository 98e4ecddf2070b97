/**
 * Shared fixtures for circulation tests: a manual clock, a log capture,
 * and an engine wired to the in-memory backend.
 */

import Fastify, { type FastifyBaseLogger } from 'fastify';
import { type AppConfig, loadConfig } from '../src/config.js';
import { createMemoryBackend, type MemorySeed } from '../src/backend.js';
import type { Deadline } from '../src/lib/deadline.js';
import type {
  ICirculationStore,
  IMemberDirectory,
  MemoryCirculationStore,
} from '../src/repositories/index.js';
import { AllocationEngine, type OperationContext } from '../src/services/allocation.service.js';
import { AuditEmitter } from '../src/services/audit.service.js';
import { LedgerCatalogDirectory } from '../src/services/catalog-directory.js';
import { CirculationQueries } from '../src/services/circulation-queries.js';
import { IdempotencyCoordinator } from '../src/services/idempotency.service.js';
import type { Actor } from '@circulation/domain';

export const T0 = new Date('2026-03-01T10:00:00.000Z');
export const DAY_MS = 24 * 60 * 60 * 1000;

export class ManualClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface LogLine {
  level: number;
  code?: string;
  msg?: string;
  [key: string]: unknown;
}

/** A real pino logger (via Fastify) whose JSON lines are kept in memory. */
export function captureLogger(): { logger: FastifyBaseLogger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const app = Fastify({
    logger: {
      level: 'info',
      stream: {
        write(line: string) {
          lines.push(JSON.parse(line));
        },
      },
    },
  });
  return { logger: app.log, lines };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    JWT_SECRET: 'test-secret',
    STORE_DRIVER: 'memory',
    IDEMPOTENCY_POLL_MS: '5',
    ...env,
  });
}

export const SEED: MemorySeed = {
  copies: [
    { copyId: 'C1', bookId: 'B1' },
    { copyId: 'C2', bookId: 'B1' },
    { copyId: 'C7', bookId: 'B7' },
  ],
  members: [
    { userId: 'U1', active: true, loanLimit: 5 },
    { userId: 'U2', active: true, loanLimit: 5 },
    { userId: 'U3', active: false, loanLimit: 5 },
    { userId: 'U4', active: true, loanLimit: 1 },
  ],
};

export const member = (userId: string): Actor => ({ userId, role: 'MEMBER' });
export const ADMIN: Actor = { userId: 'A1', role: 'ADMIN' };

export interface Harness {
  engine: AllocationEngine;
  queries: CirculationQueries;
  coordinator: IdempotencyCoordinator;
  store: MemoryCirculationStore;
  config: AppConfig;
  lines: LogLine[];
  now: () => Date;
  /** Context for one write; the deadline defaults to now + the configured budget. */
  ctx(actor: Actor, idempotencyKey: string, deadline?: Deadline): OperationContext;
}

export interface HarnessOptions {
  clock?: ManualClock;
  env?: Record<string, string>;
  seed?: MemorySeed;
  /** Replace the store the engine writes through (the harness store still backs it). */
  wrapStore?: (store: MemoryCirculationStore) => ICirculationStore;
  /** Replace the member directory each engine transaction sees. */
  wrapMembers?: (members: IMemberDirectory) => IMemberDirectory;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const config = testConfig(options.env);
  const now = options.clock?.now ?? (() => new Date());
  const { logger, lines } = captureLogger();
  const memory = createMemoryBackend(options.seed ?? SEED, now);
  const store = memory.store;
  const wrapped = options.wrapStore ? options.wrapStore(store) : store;
  const engineStore = options.wrapMembers ? withMembers(wrapped, options.wrapMembers) : wrapped;

  const coordinator = new IdempotencyCoordinator(engineStore.idempotency, {
    policy: config.idempotency,
    logger,
    now,
    purgeSampleRate: 0,
  });
  const engine = new AllocationEngine({
    store: engineStore,
    coordinator,
    audit: new AuditEmitter(engineStore.audit, logger, now),
    catalog: new LedgerCatalogDirectory(engineStore.copies),
    policy: config.circulation,
    logger,
    now,
  });

  return {
    engine,
    queries: new CirculationQueries(engineStore, logger),
    coordinator,
    store,
    config,
    lines,
    now,
    ctx(actor, idempotencyKey, deadline) {
      return {
        actor,
        idempotencyKey,
        correlationId: `req-${idempotencyKey}`,
        deadline: deadline ?? now().getTime() + config.deadline.defaultMs,
      };
    },
  };
}

/** A promise with its resolver, for holding an operation mid-flight. */
export function gate(): { opened: Promise<void>; open: () => void } {
  let open = (): void => {};
  const opened = new Promise<void>(resolve => {
    open = resolve;
  });
  return { opened, open };
}

function withMembers(
  store: ICirculationStore,
  wrap: (members: IMemberDirectory) => IMemberDirectory,
): ICirculationStore {
  return {
    copies: store.copies,
    loans: store.loans,
    audit: store.audit,
    idempotency: store.idempotency,
    transaction: (fn, options) => store.transaction(tx => fn({ ...tx, members: wrap(tx.members) }), options),
    close: () => store.close(),
  };
}
