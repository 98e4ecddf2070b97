/**
 * In-memory Resource Ledger
 * Conditional transitions are synchronous check-and-set on the row, gated by
 * the copy transition table.
 */

import { type Copy, type CopyStatus, canTransitionCopy } from '@circulation/domain';
import type { IResourceLedger } from '../interfaces/copy.repository.js';
import type { KeyedRows } from './tables.js';

export class MemoryResourceLedger implements IResourceLedger {
  constructor(
    private readonly copies: KeyedRows<string, Copy>,
    private readonly now: () => Date,
  ) {}

  async getCopy(copyId: string): Promise<Copy | null> {
    const copy = this.copies.get(copyId);
    return copy ? { ...copy } : null;
  }

  async tryAllocate(copyId: string, loanId: string): Promise<Copy | null> {
    return this.transition(copyId, 'LOANED', loanId);
  }

  async release(copyId: string, expectedLoanId: string): Promise<Copy | null> {
    return this.transition(copyId, 'AVAILABLE', null, c => c.currentLoanId === expectedLoanId);
  }

  async markLost(copyId: string): Promise<Copy | null> {
    return this.transition(copyId, 'LOST', null);
  }

  async retire(copyId: string): Promise<Copy | null> {
    return this.transition(copyId, 'RETIRED', null);
  }

  private transition(
    copyId: string,
    status: CopyStatus,
    currentLoanId: string | null,
    expected: (copy: Copy) => boolean = () => true,
  ): Copy | null {
    const copy = this.copies.get(copyId);
    if (!copy || !canTransitionCopy(copy.status, status) || !expected(copy)) return null;
    const updated: Copy = { ...copy, status, currentLoanId, updatedAt: this.now() };
    this.copies.set(copyId, updated);
    return { ...updated };
  }
}
