/**
 * Circulation Store
 *
 * One store backs both ledgers, so a transition spanning the Resource Ledger
 * and the Loan Ledger is a single storage transaction: either every write
 * lands or none does.
 */

import type { IResourceLedger } from './copy.repository.js';
import type { ILoanLedger } from './loan.repository.js';
import type { IAuditLog } from './audit.repository.js';
import type { IIdempotencyStore } from './idempotency.repository.js';
import type { IMemberDirectory } from './member.repository.js';

export interface CirculationTransaction {
  copies: IResourceLedger;
  loans: ILoanLedger;
  audit: IAuditLog;
  idempotency: IIdempotencyStore;
  members: IMemberDirectory;
  /**
   * Run fn so that, if it fails, only its own writes are undone and the
   * enclosing transaction stays usable.
   */
  savepoint<T>(fn: () => Promise<T>): Promise<T>;
}

export interface StoreTransactionOptions {
  /** Bound on waiting for the per-copy lock. Exceeding it fails with TIMEOUT. */
  lockTimeoutMs: number;
}

export interface ICirculationStore {
  /** Autocommit views for the read path and for idempotency claims. */
  readonly copies: IResourceLedger;
  readonly loans: ILoanLedger;
  readonly audit: IAuditLog;
  readonly idempotency: IIdempotencyStore;

  /**
   * Run fn as one atomic unit. Storage failures are translated into
   * CirculationErrors (lock waits → TIMEOUT, anything else → INTERNAL).
   */
  transaction<T>(fn: (tx: CirculationTransaction) => Promise<T>, options: StoreTransactionOptions): Promise<T>;

  close(): Promise<void>;
}
