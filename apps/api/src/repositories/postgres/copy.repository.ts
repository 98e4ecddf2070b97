/**
 * PostgreSQL Resource Ledger
 *
 * Each transition is one conditional UPDATE; the WHERE clause is the
 * check and the row lock makes it atomic against concurrent writers.
 */

import type { Copy, CopyStatus } from '@circulation/domain';
import type { Queryable } from '../../db/index.js';
import type { IResourceLedger } from '../interfaces/copy.repository.js';

interface CopyRow {
  copy_id: string;
  book_id: string;
  status: CopyStatus;
  current_loan_id: string | null;
  updated_at: Date;
}

function mapCopyRow(row: CopyRow): Copy {
  return {
    copyId: row.copy_id,
    bookId: row.book_id,
    status: row.status,
    currentLoanId: row.current_loan_id,
    updatedAt: row.updated_at,
  };
}

const COPY_COLUMNS = 'copy_id, book_id, status, current_loan_id, updated_at';

export class PostgresResourceLedger implements IResourceLedger {
  constructor(private readonly db: Queryable) {}

  async getCopy(copyId: string): Promise<Copy | null> {
    const result = await this.db.query<CopyRow>(`
      SELECT ${COPY_COLUMNS} FROM copy WHERE copy_id = $1
    `, [copyId]);

    if (result.rows.length === 0) return null;
    return mapCopyRow(result.rows[0]);
  }

  async tryAllocate(copyId: string, loanId: string): Promise<Copy | null> {
    return this.transition(`
      UPDATE copy
      SET status = 'LOANED', current_loan_id = $2, updated_at = NOW()
      WHERE copy_id = $1 AND status = 'AVAILABLE'
      RETURNING ${COPY_COLUMNS}
    `, [copyId, loanId]);
  }

  async release(copyId: string, expectedLoanId: string): Promise<Copy | null> {
    return this.transition(`
      UPDATE copy
      SET status = 'AVAILABLE', current_loan_id = NULL, updated_at = NOW()
      WHERE copy_id = $1 AND status = 'LOANED' AND current_loan_id = $2
      RETURNING ${COPY_COLUMNS}
    `, [copyId, expectedLoanId]);
  }

  async markLost(copyId: string): Promise<Copy | null> {
    return this.transition(`
      UPDATE copy
      SET status = 'LOST', current_loan_id = NULL, updated_at = NOW()
      WHERE copy_id = $1 AND status = 'LOANED'
      RETURNING ${COPY_COLUMNS}
    `, [copyId]);
  }

  async retire(copyId: string): Promise<Copy | null> {
    return this.transition(`
      UPDATE copy
      SET status = 'RETIRED', updated_at = NOW()
      WHERE copy_id = $1 AND status = 'AVAILABLE'
      RETURNING ${COPY_COLUMNS}
    `, [copyId]);
  }

  private async transition(sql: string, params: unknown[]): Promise<Copy | null> {
    const result = await this.db.query<CopyRow>(sql, params);
    if (result.rows.length === 0) return null;
    return mapCopyRow(result.rows[0]);
  }
}
