/**
 * In-memory Circulation Store
 *
 * Stand-in for PostgreSQL in tests and local runs only. Transactions run one
 * at a time behind a single async lock, so unrelated copies are serialised
 * too; deployments use the PostgreSQL store, which locks per row. Each
 * transaction writes into drafts that are committed together, or discarded
 * when fn throws. Waiting for the lock is bounded by the caller's lock timeout.
 */

import type {
  AuditEvent,
  AuditGap,
  Copy,
  IdempotencyRecord,
  Loan,
  LoanEntry,
} from '@circulation/domain';
import { timeout, translateStorageError } from '../../lib/errors.js';
import type {
  CirculationTransaction,
  ICirculationStore,
  StoreTransactionOptions,
} from '../interfaces/store.js';
import { MemoryResourceLedger } from './copy.repository.js';
import { MemoryLoanLedger } from './loan.repository.js';
import { MemoryAuditLog } from './audit.repository.js';
import { MemoryIdempotencyStore } from './idempotency.repository.js';
import { type MemberProfile, MemoryMemberDirectory } from './member.repository.js';
import { type Draft, MemoryLog, MemoryTable } from './tables.js';

class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  acquire(timeoutMs: number): Promise<() => void> {
    const previous = this.tail;
    let releaseNext = (): void => {};
    this.tail = new Promise<void>(resolve => {
      releaseNext = resolve;
    });

    return new Promise((resolve, reject) => {
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        reject(timeout('LOCK_TIMEOUT', 'Timed out waiting for the copy; retry with the same Idempotency-Key'));
      }, timeoutMs);

      void previous.then(() => {
        clearTimeout(timer);
        // A waiter that gave up still passes the lock on
        if (timedOut) releaseNext();
        else resolve(releaseNext);
      });
    });
  }
}

export interface NewCopy {
  copyId: string;
  bookId: string;
}

export class MemoryCirculationStore implements ICirculationStore {
  private readonly tables = {
    copies: new MemoryTable<string, Copy>(),
    loans: new MemoryTable<string, Loan>(),
    loanEntries: new MemoryLog<LoanEntry>(),
    auditEvents: new MemoryLog<AuditEvent>(),
    auditGaps: new MemoryLog<AuditGap>(),
    idempotency: new MemoryTable<string, IdempotencyRecord>(),
    members: new MemoryTable<string, MemberProfile>(),
  };

  private readonly lock = new AsyncLock();

  readonly copies: MemoryResourceLedger;
  readonly loans: MemoryLoanLedger;
  readonly audit: MemoryAuditLog;
  readonly idempotency: MemoryIdempotencyStore;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.copies = new MemoryResourceLedger(this.tables.copies, now);
    this.loans = new MemoryLoanLedger(this.tables.loans, this.tables.loanEntries);
    this.audit = new MemoryAuditLog(this.tables.auditEvents, this.tables.auditGaps);
    this.idempotency = new MemoryIdempotencyStore(this.tables.idempotency);
  }

  /**
   * Register a copy as the catalog collaborator would. Existing copies are left untouched.
   */
  addCopy(copy: NewCopy): void {
    if (this.tables.copies.get(copy.copyId)) return;
    this.tables.copies.set(copy.copyId, {
      copyId: copy.copyId,
      bookId: copy.bookId,
      status: 'AVAILABLE',
      currentLoanId: null,
      updatedAt: this.now(),
    });
  }

  /** Register or replace a member profile, as the membership sync would. */
  registerMember(userId: string, profile: MemberProfile): void {
    this.tables.members.set(userId, { ...profile });
  }

  async transaction<T>(
    fn: (tx: CirculationTransaction) => Promise<T>,
    options: StoreTransactionOptions,
  ): Promise<T> {
    const release = await this.lock.acquire(options.lockTimeoutMs);
    try {
      const copies = this.tables.copies.draft();
      const loans = this.tables.loans.draft();
      const loanEntries = this.tables.loanEntries.draft();
      const auditEvents = this.tables.auditEvents.draft();
      const auditGaps = this.tables.auditGaps.draft();
      const idempotency = this.tables.idempotency.draft();
      const drafts: Draft[] = [copies, loans, loanEntries, auditEvents, auditGaps, idempotency];

      const loanLedger = new MemoryLoanLedger(loans, loanEntries);
      const tx: CirculationTransaction = {
        copies: new MemoryResourceLedger(copies, this.now),
        loans: loanLedger,
        audit: new MemoryAuditLog(auditEvents, auditGaps),
        idempotency: new MemoryIdempotencyStore(idempotency),
        members: new MemoryMemberDirectory(this.tables.members, loanLedger),
        async savepoint<R>(inner: () => Promise<R>): Promise<R> {
          const restores = drafts.map(d => d.mark());
          try {
            return await inner();
          } catch (err) {
            for (const restore of restores) restore();
            throw err;
          }
        },
      };

      const result = await fn(tx);
      for (const draft of drafts) draft.commit();
      return result;
    } catch (err) {
      throw translateStorageError(err);
    } finally {
      release();
    }
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
