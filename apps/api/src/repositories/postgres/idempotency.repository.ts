/**
 * PostgreSQL Idempotency Store
 *
 * claim() is a single INSERT ... ON CONFLICT statement, so two concurrent
 * claims for one key serialize on the primary key and exactly one wins.
 */

import type { IdempotencyRecord, IdempotencyStatus } from '@circulation/domain';
import type { Queryable } from '../../db/index.js';
import type {
  ClaimKeyData,
  ClaimResult,
  IIdempotencyStore,
} from '../interfaces/idempotency.repository.js';

interface IdempotencyRow {
  key: string;
  fingerprint: string;
  status: IdempotencyStatus;
  result: unknown;
  claim_token: string;
  lease_expires_at: Date;
  created_at: Date;
  expires_at: Date;
}

function mapIdempotencyRow(row: IdempotencyRow): IdempotencyRecord {
  return {
    key: row.key,
    fingerprint: row.fingerprint,
    status: row.status,
    result: row.result ?? null,
    claimToken: row.claim_token,
    leaseExpiresAt: row.lease_expires_at,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}

const RECORD_COLUMNS = `
  key, fingerprint, status, result, claim_token, lease_expires_at, created_at, expires_at
`;

export class PostgresIdempotencyStore implements IIdempotencyStore {
  constructor(private readonly db: Queryable) {}

  async claim(data: ClaimKeyData): Promise<ClaimResult> {
    // Replace an existing record only if it expired, or if its holder's lease
    // lapsed while IN_FLIGHT for the same operation.
    const claimed = await this.db.query<IdempotencyRow>(`
      INSERT INTO idempotency_record
        (key, fingerprint, status, result, claim_token, lease_expires_at, created_at, expires_at)
      VALUES ($1, $2, 'IN_FLIGHT', NULL, $3, $4, $5, $6)
      ON CONFLICT (key) DO UPDATE SET
        fingerprint = EXCLUDED.fingerprint,
        status = 'IN_FLIGHT',
        result = NULL,
        claim_token = EXCLUDED.claim_token,
        lease_expires_at = EXCLUDED.lease_expires_at,
        created_at = EXCLUDED.created_at,
        expires_at = EXCLUDED.expires_at,
        completed_at = NULL
      WHERE idempotency_record.expires_at <= EXCLUDED.created_at
         OR (idempotency_record.status = 'IN_FLIGHT'
             AND idempotency_record.lease_expires_at <= EXCLUDED.created_at
             AND idempotency_record.fingerprint = EXCLUDED.fingerprint)
      RETURNING ${RECORD_COLUMNS}
    `, [
      data.key,
      data.fingerprint,
      data.claimToken,
      data.leaseExpiresAt,
      data.now,
      data.expiresAt,
    ]);

    if (claimed.rows.length > 0) {
      return { claimed: true, record: mapIdempotencyRow(claimed.rows[0]) };
    }
    return { claimed: false, record: await this.find(data.key) };
  }

  async complete(key: string, claimToken: string, result: unknown, completedAt: Date): Promise<boolean> {
    const updated = await this.db.query(`
      UPDATE idempotency_record
      SET status = 'COMPLETED', result = $3, completed_at = $4
      WHERE key = $1 AND claim_token = $2 AND status = 'IN_FLIGHT'
    `, [key, claimToken, JSON.stringify(result), completedAt]);

    return (updated.rowCount ?? 0) > 0;
  }

  async release(key: string, claimToken: string): Promise<boolean> {
    const deleted = await this.db.query(`
      DELETE FROM idempotency_record
      WHERE key = $1 AND claim_token = $2 AND status = 'IN_FLIGHT'
    `, [key, claimToken]);

    return (deleted.rowCount ?? 0) > 0;
  }

  async find(key: string): Promise<IdempotencyRecord | null> {
    const result = await this.db.query<IdempotencyRow>(`
      SELECT ${RECORD_COLUMNS} FROM idempotency_record WHERE key = $1
    `, [key]);

    if (result.rows.length === 0) return null;
    return mapIdempotencyRow(result.rows[0]);
  }

  async purgeExpired(now: Date): Promise<number> {
    const deleted = await this.db.query(`
      DELETE FROM idempotency_record WHERE expires_at <= $1
    `, [now]);

    return deleted.rowCount ?? 0;
  }
}
