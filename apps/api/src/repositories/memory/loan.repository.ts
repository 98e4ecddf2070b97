/**
 * In-memory Loan Ledger
 * Mirrors the PostgreSQL ledger: current view per loan plus append-only entries,
 * and at most one ACTIVE loan per copy.
 */

import { type Loan, type LoanEntry, type LoanEntryType, canTransitionLoan } from '@circulation/domain';
import type {
  CreateActiveLoanData,
  ILoanLedger,
  RenewLoanData,
} from '../interfaces/loan.repository.js';
import type { AppendRows, KeyedRows } from './tables.js';

export class MemoryLoanLedger implements ILoanLedger {
  constructor(
    private readonly loans: KeyedRows<string, Loan>,
    private readonly entries: AppendRows<LoanEntry>,
  ) {}

  async createActiveLoan(data: CreateActiveLoanData): Promise<Loan | null> {
    if (this.loans.get(data.loanId) || this.activeByCopy(data.copyId)) return null;

    const loan: Loan = {
      loanId: data.loanId,
      copyId: data.copyId,
      userId: data.userId,
      status: 'ACTIVE',
      checkedOutAt: data.checkedOutAt,
      dueAt: data.dueAt,
      returnedAt: null,
      renewalCount: 0,
      version: 1,
    };
    return this.write(loan, 'CREATED', data.checkedOutAt);
  }

  async completeReturn(loanId: string, returnedAt: Date): Promise<Loan | null> {
    const loan = this.loans.get(loanId);
    if (!loan || !canTransitionLoan(loan.status, 'RETURNED')) return null;
    return this.write(
      { ...loan, status: 'RETURNED', returnedAt, version: loan.version + 1 },
      'RETURNED',
      returnedAt,
    );
  }

  async renew(loanId: string, data: RenewLoanData): Promise<Loan | null> {
    const loan = this.loans.get(loanId);
    if (!loan || !canTransitionLoan(loan.status, 'ACTIVE') || loan.version !== data.expectedVersion) return null;
    return this.write(
      { ...loan, dueAt: data.dueAt, renewalCount: loan.renewalCount + 1, version: loan.version + 1 },
      'RENEWED',
      data.recordedAt,
    );
  }

  async markLost(loanId: string, recordedAt: Date): Promise<Loan | null> {
    const loan = this.loans.get(loanId);
    if (!loan || !canTransitionLoan(loan.status, 'LOST')) return null;
    return this.write({ ...loan, status: 'LOST', version: loan.version + 1 }, 'LOST', recordedAt);
  }

  async findById(loanId: string): Promise<Loan | null> {
    const loan = this.loans.get(loanId);
    return loan ? { ...loan } : null;
  }

  async findActiveByCopy(copyId: string): Promise<Loan | null> {
    const loan = this.activeByCopy(copyId);
    return loan ? { ...loan } : null;
  }

  async findByUser(userId: string): Promise<Loan[]> {
    return this.loans
      .entries()
      .map(([, loan]) => loan)
      .filter(loan => loan.userId === userId)
      .sort((a, b) => b.checkedOutAt.getTime() - a.checkedOutAt.getTime())
      .map(loan => ({ ...loan }));
  }

  async countActiveByUser(userId: string): Promise<number> {
    return this.loans
      .entries()
      .filter(([, loan]) => loan.userId === userId && loan.status === 'ACTIVE')
      .length;
  }

  async listEntries(loanId: string): Promise<LoanEntry[]> {
    return this.entries
      .all()
      .filter(entry => entry.loanId === loanId)
      .sort((a, b) => a.version - b.version)
      .map(entry => ({ ...entry }));
  }

  private activeByCopy(copyId: string): Loan | undefined {
    return this.loans
      .entries()
      .map(([, loan]) => loan)
      .find(loan => loan.copyId === copyId && loan.status === 'ACTIVE');
  }

  private write(loan: Loan, entryType: LoanEntryType, recordedAt: Date): Loan {
    this.loans.set(loan.loanId, loan);
    this.entries.append({
      loanId: loan.loanId,
      version: loan.version,
      entryType,
      status: loan.status,
      dueAt: loan.dueAt,
      returnedAt: loan.returnedAt,
      renewalCount: loan.renewalCount,
      recordedAt,
    });
    return { ...loan };
  }
}
