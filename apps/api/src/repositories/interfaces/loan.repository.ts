/**
 * Loan Ledger Interface
 *
 * Append-oriented record of loan lifecycles. The current view of a loan is
 * its latest ledger entry; every state change appends a new entry.
 * At most one ACTIVE loan per copy is enforced by the store itself.
 */

import type { Loan, LoanEntry } from '@circulation/domain';

export interface CreateActiveLoanData {
  loanId: string;
  copyId: string;
  userId: string;
  checkedOutAt: Date;
  dueAt: Date;
}

export interface RenewLoanData {
  dueAt: Date;
  /** The renewal only lands if the loan is still at this version. */
  expectedVersion: number;
  recordedAt: Date;
}

export interface ILoanLedger {
  /** Returns null (Conflict) if an ACTIVE loan already exists for the copy. */
  createActiveLoan(data: CreateActiveLoanData): Promise<Loan | null>;

  /** ACTIVE → RETURNED. Returns null (Conflict) if the loan is not ACTIVE. */
  completeReturn(loanId: string, returnedAt: Date): Promise<Loan | null>;

  /** ACTIVE → ACTIVE with a new due date and renewalCount + 1. */
  renew(loanId: string, data: RenewLoanData): Promise<Loan | null>;

  /** ACTIVE → LOST. */
  markLost(loanId: string, recordedAt: Date): Promise<Loan | null>;

  findById(loanId: string): Promise<Loan | null>;
  findActiveByCopy(copyId: string): Promise<Loan | null>;
  findByUser(userId: string): Promise<Loan[]>;
  countActiveByUser(userId: string): Promise<number>;
  listEntries(loanId: string): Promise<LoanEntry[]>;
}
