/**
 * PostgreSQL Member Directory
 *
 * The member row is locked before the active loans are counted. A second
 * checkout by the same member waits on that lock and, under READ COMMITTED,
 * counts again once the first has committed.
 */

import type { Queryable } from '../../db/index.js';
import type { ILoanLedger } from '../interfaces/loan.repository.js';
import type { Eligibility, IMemberDirectory } from '../interfaces/member.repository.js';

export class PostgresMemberDirectory implements IMemberDirectory {
  constructor(
    private readonly db: Queryable,
    private readonly loans: ILoanLedger,
  ) {}

  async lockEligibility(userId: string): Promise<Eligibility | null> {
    const result = await this.db.query<{ is_active: boolean; loan_limit: number }>(`
      SELECT is_active, loan_limit FROM member WHERE user_id = $1 FOR UPDATE
    `, [userId]);

    if (result.rows.length === 0) return null;
    const row = result.rows[0];
    const activeLoans = await this.loans.countActiveByUser(userId);

    return {
      active: row.is_active,
      underLoanLimit: activeLoans < row.loan_limit,
    };
  }
}
