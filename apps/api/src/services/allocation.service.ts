/**
 * Allocation Engine
 *
 * The copy state machine: FREE → HELD (checkout), HELD → FREE (return),
 * HELD → HELD (renew), HELD → UNAVAILABLE (reportLost), FREE → UNAVAILABLE
 * (retire). Every transition is one store transaction that applies both
 * ledger mutations, appends the audit events and completes the idempotency
 * record; if any step conflicts the whole unit rolls back.
 *
 * Copy.status and Loan.status are written only from here.
 */

import { randomUUID } from 'crypto';
import type { FastifyBaseLogger } from 'fastify';
import {
  type Actor,
  type AuditGap,
  type CirculationOperation,
  type Copy,
  type Loan,
  type LostReport,
  type RenewalResult,
  type ReturnReceipt,
  checkRenewal,
  computeDueAt,
  computeRenewedDueAt,
  isOverdue,
} from '@circulation/domain';
import type { CirculationPolicy } from '../config.js';
import { type Deadline, remainingMs } from '../lib/deadline.js';
import {
  CirculationError,
  conflict,
  forbidden,
  internal,
  isCirculationError,
  notFound,
  timeout,
} from '../lib/errors.js';
import { computeFingerprint, type FingerprintParams } from '../lib/fingerprint.js';
import type { CirculationTransaction, ICirculationStore } from '../repositories/index.js';
import type { AuditEmitter, EntityTransition } from './audit.service.js';
import { assertAdmin, assertLoanOwnerOrAdmin, assertSelfOrAdmin } from './authorization.js';
import type { CatalogDirectory } from './catalog-directory.js';
import type { Admission, IdempotencyCoordinator } from './idempotency.service.js';
import {
  copyCodec,
  loanCodec,
  lostReportCodec,
  receiptCodec,
  renewalCodec,
  type ResultCodec,
} from './result-codecs.js';

/** Per-call context supplied by the transport. */
export interface OperationContext {
  actor: Actor;
  idempotencyKey: string;
  correlationId: string;
  deadline: Deadline;
}

export interface AllocationEngineDeps {
  store: ICirculationStore;
  coordinator: IdempotencyCoordinator;
  audit: AuditEmitter;
  catalog: CatalogDirectory;
  policy: CirculationPolicy;
  logger: FastifyBaseLogger;
  now?: () => Date;
}

type Emit = (transition: EntityTransition) => Promise<void>;

interface Transition<T> {
  operation: CirculationOperation;
  params: FingerprintParams;
  codec: ResultCodec<T>;
  /** Checks against collaborators, run once the key is claimed. */
  precheck?: () => Promise<void>;
  apply: (tx: CirculationTransaction, emit: Emit) => Promise<T>;
}

const copyUnavailable = (): CirculationError =>
  conflict('COPY_UNAVAILABLE', 'Copy is not available');

export class AllocationEngine {
  private readonly store: ICirculationStore;
  private readonly coordinator: IdempotencyCoordinator;
  private readonly audit: AuditEmitter;
  private readonly catalog: CatalogDirectory;
  private readonly policy: CirculationPolicy;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => Date;

  constructor(deps: AllocationEngineDeps) {
    this.store = deps.store;
    this.coordinator = deps.coordinator;
    this.audit = deps.audit;
    this.catalog = deps.catalog;
    this.policy = deps.policy;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // CHECKOUT: FREE → HELD
  // ==========================================================================

  async checkout(copyId: string, userId: string, ctx: OperationContext): Promise<Loan> {
    assertSelfOrAdmin(ctx.actor, userId);

    return this.run(ctx, {
      operation: 'CHECKOUT',
      params: { copyId, userId },
      codec: loanCodec,
      precheck: async () => {
        if (!(await this.catalog.copyExists(copyId))) {
          throw notFound('COPY_NOT_FOUND', `Copy ${copyId} not found`);
        }
      },
      apply: async (tx, emit) => {
        const copy = await tx.copies.getCopy(copyId);
        if (!copy) throw notFound('COPY_NOT_FOUND', `Copy ${copyId} not found`);
        await this.assertEligible(tx, userId);
        if (copy.status !== 'AVAILABLE') throw copyUnavailable();

        const checkedOutAt = this.now();
        const loan = await tx.loans.createActiveLoan({
          loanId: randomUUID(),
          copyId,
          userId,
          checkedOutAt,
          dueAt: computeDueAt(checkedOutAt, this.policy.loanPeriodDays),
        });
        if (!loan) throw copyUnavailable();

        const allocated = await tx.copies.tryAllocate(copyId, loan.loanId);
        if (!allocated) throw copyUnavailable();

        await emit({ entityType: 'LOAN', entityId: loan.loanId, fromState: null, toState: loan.status });
        await emit({ entityType: 'COPY', entityId: copyId, fromState: copy.status, toState: allocated.status });
        return loan;
      },
    });
  }

  // ==========================================================================
  // RETURN: HELD → FREE
  // ==========================================================================

  async returnCopy(copyId: string, userId: string, ctx: OperationContext): Promise<ReturnReceipt> {
    assertSelfOrAdmin(ctx.actor, userId);

    return this.run(ctx, {
      operation: 'RETURN',
      params: { copyId, userId },
      codec: receiptCodec,
      apply: async (tx, emit) => {
        const copy = await tx.copies.getCopy(copyId);
        if (!copy) throw notFound('COPY_NOT_FOUND', `Copy ${copyId} not found`);

        const loan = await tx.loans.findActiveByCopy(copyId);
        if (!loan) throw conflict('NO_ACTIVE_LOAN', 'Copy has no active loan');
        if (loan.userId !== userId) assertLoanOwnerOrAdmin(ctx.actor, loan.userId);

        const returnedAt = this.now();
        const returned = await tx.loans.completeReturn(loan.loanId, returnedAt);
        if (!returned) throw conflict('NO_ACTIVE_LOAN', 'Copy has no active loan');

        const released = await tx.copies.release(copyId, loan.loanId);
        if (!released) throw conflict('NO_ACTIVE_LOAN', 'Copy is not held by this loan');

        await emit({ entityType: 'LOAN', entityId: loan.loanId, fromState: loan.status, toState: returned.status });
        await emit({ entityType: 'COPY', entityId: copyId, fromState: copy.status, toState: released.status });

        return {
          loanId: returned.loanId,
          copyId: returned.copyId,
          userId: returned.userId,
          checkedOutAt: returned.checkedOutAt,
          dueAt: returned.dueAt,
          returnedAt,
          overdue: isOverdue(returned.dueAt, returnedAt),
        };
      },
    });
  }

  // ==========================================================================
  // RENEW: HELD → HELD
  // ==========================================================================

  async renew(loanId: string, ctx: OperationContext): Promise<RenewalResult> {
    return this.run(ctx, {
      operation: 'RENEW',
      // Keyed to the caller: another member reusing the key must not replay the owner's renewal
      params: { loanId, actorUserId: ctx.actor.userId },
      codec: renewalCodec,
      apply: async (tx, emit) => {
        const loan = await tx.loans.findById(loanId);
        if (!loan) throw notFound('LOAN_NOT_FOUND', `Loan ${loanId} not found`);
        assertLoanOwnerOrAdmin(ctx.actor, loan.userId);

        const rejection = checkRenewal(loan, this.policy.maxRenewals);
        if (rejection === 'LOAN_NOT_ACTIVE') throw conflict(rejection, 'Loan is not active');
        if (rejection === 'RENEWAL_LIMIT_REACHED') {
          throw conflict(rejection, `Loan has reached the limit of ${this.policy.maxRenewals} renewals`);
        }

        const now = this.now();
        const renewed = await tx.loans.renew(loanId, {
          dueAt: computeRenewedDueAt(loan.dueAt, now, this.policy.renewalPeriodDays),
          expectedVersion: loan.version,
          recordedAt: now,
        });
        if (!renewed) throw conflict('LOAN_CHANGED', 'Loan changed concurrently; re-read and retry');

        await emit({ entityType: 'LOAN', entityId: loanId, fromState: loan.status, toState: renewed.status });
        return { loanId, dueAt: renewed.dueAt, renewalCount: renewed.renewalCount };
      },
    });
  }

  // ==========================================================================
  // REPORT LOST: HELD → UNAVAILABLE
  // ==========================================================================

  async reportLost(copyId: string, ctx: OperationContext): Promise<LostReport> {
    assertAdmin(ctx.actor);

    return this.run(ctx, {
      operation: 'REPORT_LOST',
      params: { copyId },
      codec: lostReportCodec,
      apply: async (tx, emit) => {
        const copy = await tx.copies.getCopy(copyId);
        if (!copy) throw notFound('COPY_NOT_FOUND', `Copy ${copyId} not found`);

        const notLoaned = () => conflict('COPY_NOT_LOANED', 'Only a loaned copy can be reported lost');
        if (copy.status !== 'LOANED') throw notLoaned();

        const loan = await tx.loans.findActiveByCopy(copyId);
        if (!loan) throw notLoaned();

        const lostLoan = await tx.loans.markLost(loan.loanId, this.now());
        if (!lostLoan) throw notLoaned();
        const lostCopy = await tx.copies.markLost(copyId);
        if (!lostCopy) throw notLoaned();

        await emit({ entityType: 'LOAN', entityId: loan.loanId, fromState: loan.status, toState: lostLoan.status });
        await emit({ entityType: 'COPY', entityId: copyId, fromState: copy.status, toState: lostCopy.status });
        return { copy: lostCopy, loan: lostLoan };
      },
    });
  }

  // ==========================================================================
  // RETIRE: FREE → UNAVAILABLE
  // ==========================================================================

  async retireCopy(copyId: string, ctx: OperationContext): Promise<Copy> {
    assertAdmin(ctx.actor);

    return this.run(ctx, {
      operation: 'RETIRE',
      params: { copyId },
      codec: copyCodec,
      apply: async (tx, emit) => {
        const copy = await tx.copies.getCopy(copyId);
        if (!copy) throw notFound('COPY_NOT_FOUND', `Copy ${copyId} not found`);

        const retired = await tx.copies.retire(copyId);
        if (!retired) {
          throw conflict('COPY_NOT_AVAILABLE_FOR_RETIREMENT', `Copy is ${copy.status.toLowerCase()} and cannot be retired`);
        }

        await emit({ entityType: 'COPY', entityId: copyId, fromState: copy.status, toState: retired.status });
        return retired;
      },
    });
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  /** Holds the member until commit, so the loan limit is counted against committed loans. */
  private async assertEligible(tx: CirculationTransaction, userId: string): Promise<void> {
    const eligibility = await tx.members.lockEligibility(userId);
    if (!eligibility) throw notFound('MEMBER_NOT_FOUND', `Member ${userId} not found`);
    if (!eligibility.active) throw forbidden('MEMBER_INACTIVE', 'Membership is not active');
    if (!eligibility.underLoanLimit) throw forbidden('LOAN_LIMIT_REACHED', 'Member has reached their loan limit');
  }

  /**
   * Admit the call through the coordinator, then apply the transition as one
   * atomic unit. A failed attempt releases its claim so the key stays usable.
   */
  private async run<T>(ctx: OperationContext, transition: Transition<T>): Promise<T> {
    const { operation } = transition;
    const { idempotencyKey } = ctx;
    const log = this.logger.child({ operation, idempotencyKey, correlationId: ctx.correlationId });
    const fingerprint = computeFingerprint(operation, transition.params);

    let admission: Admission;
    try {
      admission = await this.coordinator.admit(idempotencyKey, fingerprint, ctx.deadline);
    } catch (err) {
      throw this.surface(err, log);
    }

    if (admission.outcome === 'DUPLICATE_COMPLETED') {
      log.info({ code: 'IDEMPOTENCY_REPLAY' }, 'Replaying cached result');
      return transition.codec.decode(admission.result);
    }

    const { claim } = admission;
    try {
      if (transition.precheck) await transition.precheck();

      const lockTimeoutMs = remainingMs(ctx.deadline, this.now());
      if (lockTimeoutMs === 0) {
        throw timeout('LOCK_TIMEOUT', 'Deadline passed before the copy could be locked; retry with the same Idempotency-Key');
      }

      const gaps: AuditGap[] = [];
      const result = await this.store.transaction(async tx => {
        const emit: Emit = async t => {
          const gap = await this.audit.record(tx, t, ctx.actor, ctx.correlationId);
          if (gap) gaps.push(gap);
        };
        const value = await transition.apply(tx, emit);
        await this.coordinator.complete(tx, claim, value);
        return value;
      }, { lockTimeoutMs });

      log.info({ code: `${operation}_COMMITTED` }, 'Transition committed');
      await this.audit.flagGaps(gaps);
      return result;
    } catch (err) {
      await this.coordinator.release(claim);
      throw this.surface(err, log);
    }
  }

  private surface(err: unknown, log: FastifyBaseLogger): CirculationError {
    if (!isCirculationError(err)) {
      log.error({ err, code: 'STORAGE_FAILURE' }, 'Circulation operation failed');
      return internal();
    }
    if (err.kind === 'CONFLICT' && err.code !== 'IDEMPOTENCY_KEY_REUSED') {
      log.info({ code: 'LEDGER_CONFLICT', reason: err.code }, err.message);
    } else if (err.kind === 'TIMEOUT') {
      log.warn({ code: 'DEADLINE_EXCEEDED', reason: err.code }, err.message);
    }
    return err;
  }
}
