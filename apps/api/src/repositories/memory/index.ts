/**
 * In-memory Repository Implementations
 */

export { MemoryResourceLedger } from './copy.repository.js';
export { MemoryLoanLedger } from './loan.repository.js';
export { MemoryAuditLog } from './audit.repository.js';
export { MemoryIdempotencyStore } from './idempotency.repository.js';
export { MemoryMemberDirectory, type MemberProfile } from './member.repository.js';
export { MemoryCirculationStore, type NewCopy } from './store.js';
