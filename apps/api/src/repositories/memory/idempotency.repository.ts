/**
 * In-memory Idempotency Store
 * claim() runs without an await between check and write, so it is atomic
 * on the single event loop.
 */

import type { IdempotencyRecord } from '@circulation/domain';
import type {
  ClaimKeyData,
  ClaimResult,
  IIdempotencyStore,
} from '../interfaces/idempotency.repository.js';
import type { KeyedRows } from './tables.js';

function replaceable(existing: IdempotencyRecord, data: ClaimKeyData): boolean {
  const now = data.now.getTime();
  if (existing.expiresAt.getTime() <= now) return true;
  return existing.status === 'IN_FLIGHT'
    && existing.leaseExpiresAt.getTime() <= now
    && existing.fingerprint === data.fingerprint;
}

export class MemoryIdempotencyStore implements IIdempotencyStore {
  constructor(private readonly records: KeyedRows<string, IdempotencyRecord>) {}

  async claim(data: ClaimKeyData): Promise<ClaimResult> {
    const existing = this.records.get(data.key);
    if (existing && !replaceable(existing, data)) {
      return { claimed: false, record: { ...existing } };
    }

    const record: IdempotencyRecord = {
      key: data.key,
      fingerprint: data.fingerprint,
      status: 'IN_FLIGHT',
      result: null,
      claimToken: data.claimToken,
      leaseExpiresAt: data.leaseExpiresAt,
      createdAt: data.now,
      expiresAt: data.expiresAt,
    };
    this.records.set(data.key, record);
    return { claimed: true, record: { ...record } };
  }

  async complete(key: string, claimToken: string, result: unknown, _completedAt: Date): Promise<boolean> {
    const existing = this.records.get(key);
    if (!existing || existing.claimToken !== claimToken || existing.status !== 'IN_FLIGHT') {
      return false;
    }
    // Stored as JSON, the same shape a JSONB column hands back
    const stored: unknown = JSON.parse(JSON.stringify(result));
    this.records.set(key, { ...existing, status: 'COMPLETED', result: stored });
    return true;
  }

  async release(key: string, claimToken: string): Promise<boolean> {
    const existing = this.records.get(key);
    if (!existing || existing.claimToken !== claimToken || existing.status !== 'IN_FLIGHT') {
      return false;
    }
    return this.records.delete(key);
  }

  async find(key: string): Promise<IdempotencyRecord | null> {
    const record = this.records.get(key);
    return record ? { ...record } : null;
  }

  async purgeExpired(now: Date): Promise<number> {
    let purged = 0;
    for (const [key, record] of this.records.entries()) {
      if (record.expiresAt.getTime() <= now.getTime()) {
        this.records.delete(key);
        purged++;
      }
    }
    return purged;
  }
}
