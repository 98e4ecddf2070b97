/**
 * In-memory Member Directory
 * Store transactions already run one at a time, so counting through the
 * transaction's loan ledger needs no further lock.
 */

import type { ILoanLedger } from '../interfaces/loan.repository.js';
import type { Eligibility, IMemberDirectory } from '../interfaces/member.repository.js';
import type { KeyedRows } from './tables.js';

export interface MemberProfile {
  active: boolean;
  loanLimit: number;
}

export class MemoryMemberDirectory implements IMemberDirectory {
  constructor(
    private readonly members: KeyedRows<string, MemberProfile>,
    private readonly loans: ILoanLedger,
  ) {}

  async lockEligibility(userId: string): Promise<Eligibility | null> {
    const profile = this.members.get(userId);
    if (!profile) return null;
    const activeLoans = await this.loans.countActiveByUser(userId);
    return {
      active: profile.active,
      underLoanLimit: activeLoans < profile.loanLimit,
    };
  }
}
