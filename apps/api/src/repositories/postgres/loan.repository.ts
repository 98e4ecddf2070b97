/**
 * PostgreSQL Loan Ledger
 *
 * `loan` holds the current view; `loan_entry` is the append-only history
 * (one row per version). Both are written in the caller's transaction.
 * The partial unique index loan_one_active_per_copy backs createActiveLoan.
 */

import type { Loan, LoanEntry, LoanEntryType, LoanStatus } from '@circulation/domain';
import type { Queryable } from '../../db/index.js';
import { PG_UNIQUE_VIOLATION, pgErrorCode } from '../../lib/errors.js';
import type {
  CreateActiveLoanData,
  ILoanLedger,
  RenewLoanData,
} from '../interfaces/loan.repository.js';

interface LoanRow {
  loan_id: string;
  copy_id: string;
  user_id: string;
  status: LoanStatus;
  checked_out_at: Date;
  due_at: Date;
  returned_at: Date | null;
  renewal_count: number;
  version: number;
}

interface LoanEntryRow {
  loan_id: string;
  version: number;
  entry_type: LoanEntryType;
  status: LoanStatus;
  due_at: Date;
  returned_at: Date | null;
  renewal_count: number;
  recorded_at: Date;
}

function mapLoanRow(row: LoanRow): Loan {
  return {
    loanId: row.loan_id,
    copyId: row.copy_id,
    userId: row.user_id,
    status: row.status,
    checkedOutAt: row.checked_out_at,
    dueAt: row.due_at,
    returnedAt: row.returned_at,
    renewalCount: row.renewal_count,
    version: row.version,
  };
}

function mapLoanEntryRow(row: LoanEntryRow): LoanEntry {
  return {
    loanId: row.loan_id,
    version: row.version,
    entryType: row.entry_type,
    status: row.status,
    dueAt: row.due_at,
    returnedAt: row.returned_at,
    renewalCount: row.renewal_count,
    recordedAt: row.recorded_at,
  };
}

const LOAN_COLUMNS = `
  loan_id, copy_id, user_id, status, checked_out_at, due_at,
  returned_at, renewal_count, version
`;

export class PostgresLoanLedger implements ILoanLedger {
  constructor(private readonly db: Queryable) {}

  async createActiveLoan(data: CreateActiveLoanData): Promise<Loan | null> {
    let loan: Loan;
    try {
      const result = await this.db.query<LoanRow>(`
        INSERT INTO loan (loan_id, copy_id, user_id, status, checked_out_at, due_at, renewal_count, version)
        VALUES ($1, $2, $3, 'ACTIVE', $4, $5, 0, 1)
        ON CONFLICT (copy_id) WHERE status = 'ACTIVE' DO NOTHING
        RETURNING ${LOAN_COLUMNS}
      `, [data.loanId, data.copyId, data.userId, data.checkedOutAt, data.dueAt]);

      if (result.rows.length === 0) return null;
      loan = mapLoanRow(result.rows[0]);
    } catch (err) {
      if (pgErrorCode(err) === PG_UNIQUE_VIOLATION) return null;
      throw err;
    }

    await this.appendEntry(loan, 'CREATED', data.checkedOutAt);
    return loan;
  }

  async completeReturn(loanId: string, returnedAt: Date): Promise<Loan | null> {
    return this.transition('RETURNED', returnedAt, `
      UPDATE loan
      SET status = 'RETURNED', returned_at = $2, version = version + 1
      WHERE loan_id = $1 AND status = 'ACTIVE'
      RETURNING ${LOAN_COLUMNS}
    `, [loanId, returnedAt]);
  }

  async renew(loanId: string, data: RenewLoanData): Promise<Loan | null> {
    return this.transition('RENEWED', data.recordedAt, `
      UPDATE loan
      SET due_at = $2, renewal_count = renewal_count + 1, version = version + 1
      WHERE loan_id = $1 AND status = 'ACTIVE' AND version = $3
      RETURNING ${LOAN_COLUMNS}
    `, [loanId, data.dueAt, data.expectedVersion]);
  }

  async markLost(loanId: string, recordedAt: Date): Promise<Loan | null> {
    return this.transition('LOST', recordedAt, `
      UPDATE loan
      SET status = 'LOST', version = version + 1
      WHERE loan_id = $1 AND status = 'ACTIVE'
      RETURNING ${LOAN_COLUMNS}
    `, [loanId]);
  }

  async findById(loanId: string): Promise<Loan | null> {
    const result = await this.db.query<LoanRow>(`
      SELECT ${LOAN_COLUMNS} FROM loan WHERE loan_id = $1
    `, [loanId]);

    if (result.rows.length === 0) return null;
    return mapLoanRow(result.rows[0]);
  }

  async findActiveByCopy(copyId: string): Promise<Loan | null> {
    const result = await this.db.query<LoanRow>(`
      SELECT ${LOAN_COLUMNS} FROM loan WHERE copy_id = $1 AND status = 'ACTIVE'
    `, [copyId]);

    if (result.rows.length === 0) return null;
    return mapLoanRow(result.rows[0]);
  }

  async findByUser(userId: string): Promise<Loan[]> {
    const result = await this.db.query<LoanRow>(`
      SELECT ${LOAN_COLUMNS} FROM loan
      WHERE user_id = $1
      ORDER BY checked_out_at DESC
    `, [userId]);

    return result.rows.map(mapLoanRow);
  }

  async countActiveByUser(userId: string): Promise<number> {
    const result = await this.db.query<{ count: string }>(`
      SELECT COUNT(*) AS count FROM loan WHERE user_id = $1 AND status = 'ACTIVE'
    `, [userId]);

    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  async listEntries(loanId: string): Promise<LoanEntry[]> {
    const result = await this.db.query<LoanEntryRow>(`
      SELECT loan_id, version, entry_type, status, due_at, returned_at, renewal_count, recorded_at
      FROM loan_entry
      WHERE loan_id = $1
      ORDER BY version ASC
    `, [loanId]);

    return result.rows.map(mapLoanEntryRow);
  }

  private async transition(
    entryType: LoanEntryType,
    recordedAt: Date,
    sql: string,
    params: unknown[],
  ): Promise<Loan | null> {
    const result = await this.db.query<LoanRow>(sql, params);
    if (result.rows.length === 0) return null;
    const loan = mapLoanRow(result.rows[0]);
    await this.appendEntry(loan, entryType, recordedAt);
    return loan;
  }

  private async appendEntry(loan: Loan, entryType: LoanEntryType, recordedAt: Date): Promise<void> {
    await this.db.query(`
      INSERT INTO loan_entry
        (loan_id, version, entry_type, status, due_at, returned_at, renewal_count, recorded_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
    `, [
      loan.loanId,
      loan.version,
      entryType,
      loan.status,
      loan.dueAt,
      loan.returnedAt,
      loan.renewalCount,
      recordedAt,
    ]);
  }
}
