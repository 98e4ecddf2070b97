import { z } from 'zod';

// ============================================================================
// ENUMS
// ============================================================================

export const MemberRole = z.enum([
  'MEMBER',
  'ADMIN',
]);
export type MemberRole = z.infer<typeof MemberRole>;

export const CopyStatus = z.enum([
  'AVAILABLE',
  'LOANED',
  'LOST',
  'RETIRED',
]);
export type CopyStatus = z.infer<typeof CopyStatus>;

export const LoanStatus = z.enum([
  'ACTIVE',
  'RETURNED',
  'LOST',
]);
export type LoanStatus = z.infer<typeof LoanStatus>;

/**
 * Allocation state of a copy, derived jointly from Copy.status and the
 * status of its current loan.
 */
export const CopyState = z.enum([
  'FREE',        // AVAILABLE, no active loan
  'HELD',        // LOANED, exactly one ACTIVE loan
  'UNAVAILABLE', // LOST or RETIRED
]);
export type CopyState = z.infer<typeof CopyState>;

export const LoanEntryType = z.enum([
  'CREATED',
  'RENEWED',
  'RETURNED',
  'LOST',
]);
export type LoanEntryType = z.infer<typeof LoanEntryType>;

export const IdempotencyStatus = z.enum([
  'IN_FLIGHT',
  'COMPLETED',
]);
export type IdempotencyStatus = z.infer<typeof IdempotencyStatus>;

export const CirculationOperation = z.enum([
  'CHECKOUT',
  'RETURN',
  'RENEW',
  'REPORT_LOST',
  'RETIRE',
]);
export type CirculationOperation = z.infer<typeof CirculationOperation>;

export const AuditEntityType = z.enum([
  'COPY',
  'LOAN',
]);
export type AuditEntityType = z.infer<typeof AuditEntityType>;

/**
 * Error taxonomy shared by the engine and the transport layer.
 */
export const ErrorKind = z.enum([
  'NOT_FOUND',  // referenced copy/loan/member absent
  'CONFLICT',   // invariant-preserving rejection; re-read state before retrying
  'FORBIDDEN',  // eligibility or ownership failure
  'TIMEOUT',    // lock-wait or dedup-wait exceeded the deadline; retry with the same key
  'INTERNAL',   // storage or transport failure; retry with backoff
  'VALIDATION', // malformed input
]);
export type ErrorKind = z.infer<typeof ErrorKind>;

// ============================================================================
// CORE DOMAIN ENTITIES (Zod Schemas)
// Note: Using plain z.string() for IDs; cast to branded types at application layer
// ============================================================================

export const CopySchema = z.object({
  copyId: z.string().min(1).max(64),
  bookId: z.string().min(1).max(64),
  status: CopyStatus,
  currentLoanId: z.string().uuid().nullable(),
  updatedAt: z.date(),
});
export type Copy = z.infer<typeof CopySchema>;

export const LoanSchema = z.object({
  loanId: z.string().uuid(),
  copyId: z.string().min(1).max(64),
  userId: z.string().min(1).max(64),
  status: LoanStatus,
  checkedOutAt: z.date(),
  dueAt: z.date(),
  returnedAt: z.date().nullable(),
  renewalCount: z.number().int().min(0),
  version: z.number().int().min(1),
});
export type Loan = z.infer<typeof LoanSchema>;

export const LoanEntrySchema = z.object({
  loanId: z.string().uuid(),
  version: z.number().int().min(1),
  entryType: LoanEntryType,
  status: LoanStatus,
  dueAt: z.date(),
  returnedAt: z.date().nullable(),
  renewalCount: z.number().int().min(0),
  recordedAt: z.date(),
});
export type LoanEntry = z.infer<typeof LoanEntrySchema>;

export const IdempotencyRecordSchema = z.object({
  key: z.string().min(1).max(256),
  fingerprint: z.string().length(64),
  status: IdempotencyStatus,
  result: z.unknown().nullable(),
  claimToken: z.string().uuid(),
  leaseExpiresAt: z.date(),
  createdAt: z.date(),
  expiresAt: z.date(),
});
export type IdempotencyRecord = z.infer<typeof IdempotencyRecordSchema>;

export const AuditEventSchema = z.object({
  eventId: z.string().uuid(),
  entityType: AuditEntityType,
  entityId: z.string(),
  fromState: z.string().nullable(),
  toState: z.string(),
  actorUserId: z.string(),
  actorRole: MemberRole,
  correlationId: z.string(),
  occurredAt: z.date(),
});
export type AuditEvent = z.infer<typeof AuditEventSchema>;

export const AuditGapSchema = z.object({
  entityType: AuditEntityType,
  entityId: z.string(),
  fromState: z.string().nullable(),
  toState: z.string(),
  correlationId: z.string(),
  reason: z.string(),
  detectedAt: z.date(),
});
export type AuditGap = z.infer<typeof AuditGapSchema>;

// ============================================================================
// OPERATION RESULTS
// ============================================================================

export interface ReturnReceipt {
  loanId: string;
  copyId: string;
  userId: string;
  checkedOutAt: Date;
  dueAt: Date;
  returnedAt: Date;
  overdue: boolean;
}

export interface RenewalResult {
  loanId: string;
  dueAt: Date;
  renewalCount: number;
}

export interface LostReport {
  copy: Copy;
  loan: Loan;
}

export interface CopyAvailability {
  copyId: string;
  bookId: string;
  status: CopyStatus;
  state: CopyState;
  currentLoanId: string | null;
}

/**
 * Authenticated caller, as supplied by the identity collaborator.
 */
export interface Actor {
  userId: string;
  role: MemberRole;
}
