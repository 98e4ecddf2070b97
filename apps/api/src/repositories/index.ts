/**
 * Repositories
 *
 * Ledger interfaces plus the two adapters that implement them: PostgreSQL in
 * deployed environments, the in-memory stand-in for tests and local runs.
 */

export * from './interfaces/index.js';
export { PostgresCirculationStore } from './postgres/index.js';
export { MemoryCirculationStore, type MemberProfile, type NewCopy } from './memory/index.js';
