/**
 * Repository Interfaces
 * Abstract persistence layer; PostgreSQL in production, in-memory for tests and local runs
 */

export * from './copy.repository.js';
export * from './loan.repository.js';
export * from './audit.repository.js';
export * from './idempotency.repository.js';
export * from './member.repository.js';
export * from './store.js';
