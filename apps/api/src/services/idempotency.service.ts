/**
 * Idempotency Coordinator
 *
 * Two-phase marker per key: IN_FLIGHT while the first caller executes, then
 * COMPLETED with the cached result. The marker is completed inside the same
 * storage transaction as the ledger mutations, so a COMPLETED record always
 * has committed ledger state (and its audit events) behind it.
 *
 * Keys expire after the retention window. An IN_FLIGHT record whose lease
 * lapsed (owner crashed) may be taken over by a retry with the same
 * fingerprint; the previous owner's complete() then fails on its token.
 */

import { randomUUID } from 'crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { IdempotencyPolicy } from '../config.js';
import { type Deadline, remainingMs, sleep } from '../lib/deadline.js';
import { conflict, timeout } from '../lib/errors.js';
import type {
  CirculationTransaction,
  IIdempotencyStore,
} from '../repositories/index.js';

/** Proof of ownership of an IN_FLIGHT key. */
export interface IdempotencyClaim {
  key: string;
  fingerprint: string;
  claimToken: string;
}

export type BeginOutcome =
  | { outcome: 'NEW'; claim: IdempotencyClaim }
  | { outcome: 'DUPLICATE_IN_FLIGHT' }
  | { outcome: 'DUPLICATE_COMPLETED'; result: unknown }
  | { outcome: 'KEY_REUSE_MISMATCH' };

/** What a caller proceeds with once in-flight duplicates have resolved. */
export type Admission =
  | { outcome: 'NEW'; claim: IdempotencyClaim }
  | { outcome: 'DUPLICATE_COMPLETED'; result: unknown };

export interface IdempotencyCoordinatorOptions {
  policy: IdempotencyPolicy;
  logger: FastifyBaseLogger;
  now?: () => Date;
  /** Fraction of begin() calls that also purge expired records. */
  purgeSampleRate?: number;
  random?: () => number;
}

export class IdempotencyCoordinator {
  private readonly policy: IdempotencyPolicy;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => Date;
  private readonly purgeSampleRate: number;
  private readonly random: () => number;

  constructor(
    private readonly store: IIdempotencyStore,
    options: IdempotencyCoordinatorOptions,
  ) {
    this.policy = options.policy;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.purgeSampleRate = options.purgeSampleRate ?? 0.01;
    this.random = options.random ?? Math.random;
  }

  /**
   * Claim the key or report what already holds it.
   * Linearizable per key: of two concurrent identical calls exactly one sees NEW.
   */
  async begin(key: string, fingerprint: string): Promise<BeginOutcome> {
    this.maybePurge();

    const now = this.now();
    const claimToken = randomUUID();
    const result = await this.store.claim({
      key,
      fingerprint,
      claimToken,
      now,
      leaseExpiresAt: new Date(now.getTime() + this.policy.leaseMs),
      expiresAt: new Date(now.getTime() + this.policy.retentionMs),
    });

    if (result.claimed) {
      return { outcome: 'NEW', claim: { key, fingerprint, claimToken } };
    }

    const existing = result.record;
    // Released between the claim and the read; the next attempt can claim it
    if (!existing) return { outcome: 'DUPLICATE_IN_FLIGHT' };
    if (existing.fingerprint !== fingerprint) return { outcome: 'KEY_REUSE_MISMATCH' };
    if (existing.status === 'COMPLETED') {
      return { outcome: 'DUPLICATE_COMPLETED', result: existing.result };
    }
    return { outcome: 'DUPLICATE_IN_FLIGHT' };
  }

  /**
   * begin(), polling while a duplicate is in flight until it resolves or the
   * deadline passes. Mismatched reuse of a key is a Conflict.
   */
  async admit(key: string, fingerprint: string, deadline: Deadline): Promise<Admission> {
    for (;;) {
      const begun = await this.begin(key, fingerprint);
      switch (begun.outcome) {
        case 'NEW':
        case 'DUPLICATE_COMPLETED':
          return begun;
        case 'KEY_REUSE_MISMATCH':
          this.logger.warn({ code: 'IDEMPOTENCY_KEY_REUSED', idempotencyKey: key }, 'Idempotency key reused with different parameters');
          throw conflict('IDEMPOTENCY_KEY_REUSED', 'Idempotency key already used for a different operation');
        case 'DUPLICATE_IN_FLIGHT':
          break;
      }

      const remaining = remainingMs(deadline, this.now());
      if (remaining === 0) {
        throw timeout('IDEMPOTENCY_WAIT_TIMEOUT', 'A request with this Idempotency-Key is still in progress; retry later');
      }
      await sleep(Math.min(this.policy.pollIntervalMs, remaining));
    }
  }

  /**
   * Mark the key COMPLETED with the operation's result. Must run inside the
   * transaction that applies the operation; fails if the claim was taken over.
   */
  async complete(tx: CirculationTransaction, claim: IdempotencyClaim, result: unknown): Promise<void> {
    const completed = await tx.idempotency.complete(claim.key, claim.claimToken, result, this.now());
    if (!completed) {
      throw timeout('IDEMPOTENCY_CLAIM_LOST', 'The request outlived its idempotency lease; retry with the same Idempotency-Key');
    }
  }

  /**
   * Drop an IN_FLIGHT claim after a failed attempt so the key can be retried.
   * Never throws: a claim left behind expires with its lease.
   */
  async release(claim: IdempotencyClaim): Promise<void> {
    try {
      await this.store.release(claim.key, claim.claimToken);
    } catch (err) {
      this.logger.error({ err, code: 'STORAGE_FAILURE', idempotencyKey: claim.key }, 'Failed to release idempotency claim');
    }
  }

  async purgeExpired(): Promise<number> {
    const purged = await this.store.purgeExpired(this.now());
    if (purged > 0) {
      this.logger.info({ code: 'IDEMPOTENCY_PURGED', purged }, 'Purged expired idempotency records');
    }
    return purged;
  }

  private maybePurge(): void {
    if (this.random() >= this.purgeSampleRate) return;
    this.purgeExpired().catch(err => {
      this.logger.error({ err, code: 'STORAGE_FAILURE' }, 'Opportunistic idempotency purge failed');
    });
  }
}
