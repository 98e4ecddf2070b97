/**
 * Circulation read path.
 *
 * Reads go straight to the ledgers' autocommit views: no idempotency key,
 * no locking. Each answer reflects some committed state.
 */

import type { FastifyBaseLogger } from 'fastify';
import {
  type Actor,
  type AuditEntityType,
  type AuditEvent,
  type AuditGap,
  type CopyAvailability,
  type CopyState,
  type Loan,
  type LoanEntry,
  copyStateOf,
  deriveCopyState,
} from '@circulation/domain';
import { notFound, translateStorageError } from '../lib/errors.js';
import type { ICirculationStore } from '../repositories/index.js';
import { assertAdmin, assertLoanOwnerOrAdmin, assertSelfOrAdmin } from './authorization.js';

export interface LoanHistory {
  loan: Loan;
  entries: LoanEntry[];
}

export class CirculationQueries {
  constructor(
    private readonly store: ICirculationStore,
    private readonly logger: FastifyBaseLogger,
  ) {}

  /**
   * The copy and its current loan are two autocommit reads; a transition
   * landing between them is read again once before falling back to the
   * state implied by the copy alone.
   */
  async getCopy(copyId: string): Promise<CopyAvailability> {
    for (let attempt = 1; ; attempt++) {
      const copy = await this.read(() => this.store.copies.getCopy(copyId));
      if (!copy) throw notFound('COPY_NOT_FOUND', `Copy ${copyId} not found`);

      const loanId = copy.currentLoanId;
      const currentLoan = loanId === null ? null : await this.read(() => this.store.loans.findById(loanId));
      let state: CopyState | null = deriveCopyState(copy, currentLoan);
      if (state === null) {
        if (attempt < 2) continue;
        this.logger.warn({ code: 'COPY_STATE_INCONSISTENT', copyId, loanId }, 'Copy and loan ledgers disagree');
        state = copyStateOf(copy.status);
      }

      return {
        copyId: copy.copyId,
        bookId: copy.bookId,
        status: copy.status,
        state,
        currentLoanId: copy.currentLoanId,
      };
    }
  }

  async getActiveLoan(copyId: string): Promise<Loan> {
    const copy = await this.read(() => this.store.copies.getCopy(copyId));
    if (!copy) throw notFound('COPY_NOT_FOUND', `Copy ${copyId} not found`);
    const loan = await this.read(() => this.store.loans.findActiveByCopy(copyId));
    if (!loan) throw notFound('NO_ACTIVE_LOAN', 'Copy has no active loan');
    return loan;
  }

  async listLoans(userId: string, actor: Actor): Promise<Loan[]> {
    assertSelfOrAdmin(actor, userId);
    return this.read(() => this.store.loans.findByUser(userId));
  }

  async getLoanHistory(loanId: string, actor: Actor): Promise<LoanHistory> {
    const loan = await this.read(() => this.store.loans.findById(loanId));
    if (!loan) throw notFound('LOAN_NOT_FOUND', `Loan ${loanId} not found`);
    assertLoanOwnerOrAdmin(actor, loan.userId);
    const entries = await this.read(() => this.store.loans.listEntries(loanId));
    return { loan, entries };
  }

  async listAuditEvents(entityType: AuditEntityType, entityId: string, actor: Actor): Promise<AuditEvent[]> {
    assertAdmin(actor);
    return this.read(() => this.store.audit.listByEntity(entityType, entityId));
  }

  async listAuditGaps(actor: Actor): Promise<AuditGap[]> {
    assertAdmin(actor);
    return this.read(() => this.store.audit.listGaps());
  }

  private async read<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const translated = translateStorageError(err);
      if (translated.kind === 'INTERNAL') {
        this.logger.error({ err, code: 'STORAGE_FAILURE' }, 'Circulation read failed');
      }
      throw translated;
    }
  }
}
