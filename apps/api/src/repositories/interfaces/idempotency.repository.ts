/**
 * Idempotency Store Interface
 *
 * Per-key dedup markers. A key is claimed atomically: the second of two
 * concurrent claims for the same key always observes the first.
 */

import type { IdempotencyRecord } from '@circulation/domain';

export interface ClaimKeyData {
  key: string;
  fingerprint: string;
  claimToken: string;
  now: Date;
  leaseExpiresAt: Date;
  expiresAt: Date;
}

export type ClaimResult =
  | { claimed: true; record: IdempotencyRecord }
  /** record is null when the holder released the key between the claim and the read. */
  | { claimed: false; record: IdempotencyRecord | null };

export interface IIdempotencyStore {
  /**
   * Insert an IN_FLIGHT record for the key. An existing record is replaced only
   * when it has expired, or when it is IN_FLIGHT with a lapsed lease and the
   * same fingerprint (takeover from a crashed holder).
   */
  claim(data: ClaimKeyData): Promise<ClaimResult>;

  /** IN_FLIGHT → COMPLETED, fenced on the claim token. Returns false if the claim was lost. */
  complete(key: string, claimToken: string, result: unknown, completedAt: Date): Promise<boolean>;

  /** Drop an IN_FLIGHT record still held by claimToken. */
  release(key: string, claimToken: string): Promise<boolean>;

  find(key: string): Promise<IdempotencyRecord | null>;

  /** Delete records past expires_at. Returns the number removed. */
  purgeExpired(now: Date): Promise<number>;
}
