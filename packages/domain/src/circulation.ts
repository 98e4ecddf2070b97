/**
 * Circulation State Machine
 *
 * PURE DOMAIN LOGIC - No database, no API dependencies.
 * Copy state derivation, allowed status transitions and due-date arithmetic.
 */

import {
  type Copy,
  type CopyState,
  type CopyStatus,
  type ErrorKind,
  type Loan,
  type LoanStatus,
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// TRANSITIONS
// ============================================================================

/**
 * Allowed Copy.status transitions. RETIRED is terminal: copies are never deleted.
 */
export const COPY_TRANSITIONS: Record<CopyStatus, readonly CopyStatus[]> = {
  AVAILABLE: ['LOANED', 'RETIRED'],
  LOANED: ['AVAILABLE', 'LOST'],
  LOST: [],
  RETIRED: [],
};

/**
 * Allowed Loan.status transitions. Loans are immutable once RETURNED or LOST;
 * a renewal is an ACTIVE → ACTIVE self-transition.
 */
export const LOAN_TRANSITIONS: Record<LoanStatus, readonly LoanStatus[]> = {
  ACTIVE: ['ACTIVE', 'RETURNED', 'LOST'],
  RETURNED: [],
  LOST: [],
};

export function canTransitionCopy(from: CopyStatus, to: CopyStatus): boolean {
  return COPY_TRANSITIONS[from].includes(to);
}

export function canTransitionLoan(from: LoanStatus, to: LoanStatus): boolean {
  return LOAN_TRANSITIONS[from].includes(to);
}

// ============================================================================
// STATE DERIVATION
// ============================================================================

/**
 * Derive the allocation state of a copy from its status and current loan.
 *
 * Returns null when the pair violates the ledger invariant
 * (LOANED ⇔ current loan is ACTIVE and points back at this copy).
 */
export function deriveCopyState(copy: Copy, currentLoan: Loan | null): CopyState | null {
  switch (copy.status) {
    case 'AVAILABLE':
      return copy.currentLoanId === null ? 'FREE' : null;
    case 'LOANED':
      if (
        currentLoan === null ||
        copy.currentLoanId !== currentLoan.loanId ||
        currentLoan.status !== 'ACTIVE' ||
        currentLoan.copyId !== copy.copyId
      ) {
        return null;
      }
      return 'HELD';
    case 'LOST':
    case 'RETIRED':
      return 'UNAVAILABLE';
  }
}

/**
 * State implied by Copy.status alone (read path, no loan lookup).
 */
export function copyStateOf(status: CopyStatus): CopyState {
  if (status === 'AVAILABLE') return 'FREE';
  if (status === 'LOANED') return 'HELD';
  return 'UNAVAILABLE';
}

// ============================================================================
// DUE DATES & RENEWAL
// ============================================================================

export function computeDueAt(checkedOutAt: Date, loanPeriodDays: number): Date {
  return new Date(checkedOutAt.getTime() + loanPeriodDays * DAY_MS);
}

/**
 * A renewal extends from the later of the current due date and now, so an
 * overdue loan is not renewed into the past.
 */
export function computeRenewedDueAt(currentDueAt: Date, now: Date, renewalPeriodDays: number): Date {
  const base = Math.max(currentDueAt.getTime(), now.getTime());
  return new Date(base + renewalPeriodDays * DAY_MS);
}

export function isOverdue(dueAt: Date, at: Date): boolean {
  return at.getTime() > dueAt.getTime();
}

export type RenewalRejection = 'LOAN_NOT_ACTIVE' | 'RENEWAL_LIMIT_REACHED';

export function checkRenewal(loan: Loan, maxRenewals: number): RenewalRejection | null {
  if (loan.status !== 'ACTIVE') return 'LOAN_NOT_ACTIVE';
  if (loan.renewalCount >= maxRenewals) return 'RENEWAL_LIMIT_REACHED';
  return null;
}

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Whether a caller may retry an operation that failed with this kind.
 * CONFLICT is retryable only after re-reading state, so it is reported as not retryable.
 */
export function isRetryableKind(kind: ErrorKind): boolean {
  return kind === 'TIMEOUT' || kind === 'INTERNAL';
}
