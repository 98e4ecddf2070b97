/**
 * Backend factory
 *
 * Builds the circulation store for the configured driver. Member eligibility
 * lives in the same store, so a checkout counts loans inside its own
 * transaction.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { AppConfig } from './config.js';
import { createPool } from './db/index.js';
import {
  type ICirculationStore,
  MemoryCirculationStore,
  PostgresCirculationStore,
} from './repositories/index.js';

export interface CirculationBackend {
  store: ICirculationStore;
}

export interface MemoryBackend extends CirculationBackend {
  store: MemoryCirculationStore;
}

export interface MemorySeed {
  copies: Array<{ copyId: string; bookId: string }>;
  members: Array<{ userId: string; active: boolean; loanLimit: number }>;
}

export function createMemoryBackend(seed: MemorySeed, now?: () => Date): MemoryBackend {
  const store = new MemoryCirculationStore(now);
  for (const copy of seed.copies) store.addCopy(copy);
  for (const member of seed.members) {
    store.registerMember(member.userId, { active: member.active, loanLimit: member.loanLimit });
  }
  return { store };
}

export function createPostgresBackend(config: AppConfig, logger: FastifyBaseLogger): CirculationBackend {
  return { store: new PostgresCirculationStore(createPool(config.db), logger) };
}
