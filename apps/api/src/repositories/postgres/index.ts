/**
 * PostgreSQL Repository Implementations
 */

export { PostgresResourceLedger } from './copy.repository.js';
export { PostgresLoanLedger } from './loan.repository.js';
export { PostgresAuditLog } from './audit.repository.js';
export { PostgresIdempotencyStore } from './idempotency.repository.js';
export { PostgresMemberDirectory } from './member.repository.js';
export { PostgresCirculationStore } from './store.js';
