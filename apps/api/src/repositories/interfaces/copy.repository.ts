/**
 * Resource Ledger Interface
 *
 * Durable record of each copy's allocation status and current holder.
 * Every mutating method is a single atomic check-and-set against the store:
 * it returns the updated copy, or null when the expected state did not hold
 * (Conflict), with no side effects.
 */

import type { Copy } from '@circulation/domain';

export interface IResourceLedger {
  getCopy(copyId: string): Promise<Copy | null>;

  /** AVAILABLE → LOANED, binding the copy to loanId. */
  tryAllocate(copyId: string, loanId: string): Promise<Copy | null>;

  /** LOANED → AVAILABLE, only while the copy is bound to expectedLoanId. */
  release(copyId: string, expectedLoanId: string): Promise<Copy | null>;

  /** LOANED → LOST. */
  markLost(copyId: string): Promise<Copy | null>;

  /** AVAILABLE → RETIRED. */
  retire(copyId: string): Promise<Copy | null>;
}
