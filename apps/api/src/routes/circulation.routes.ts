/**
 * Circulation Routes
 * HTTP binding of the allocation engine and the circulation read path.
 *
 * Writes carry an Idempotency-Key and run under the request deadline.
 * Reads bypass idempotency and locking.
 */

import { FastifyInstance, FastifyRequest } from 'fastify';
import { contract, type CopyApi, type LoanApi } from '@circulation/contract';
import {
  type AuditEvent,
  type AuditGap,
  type Copy,
  type Loan,
  type LoanEntry,
  type ReturnReceipt,
  copyStateOf,
  isOverdue,
} from '@circulation/domain';
import { registerContractRoute } from '../lib/contract-route.js';
import { internal } from '../lib/errors.js';
import { actorOf, requireAdmin, requireMember } from '../plugins/auth.js';
import type { AllocationEngine, OperationContext } from '../services/allocation.service.js';
import type { CirculationQueries } from '../services/circulation-queries.js';

export interface CirculationRoutesOptions {
  engine: AllocationEngine;
  queries: CirculationQueries;
  now: () => Date;
}

// ============================================================================
// Formatting
// ============================================================================

export function formatLoan(loan: Loan, at: Date): LoanApi {
  return {
    loanId: loan.loanId,
    copyId: loan.copyId,
    userId: loan.userId,
    status: loan.status,
    checkedOutAt: loan.checkedOutAt.toISOString(),
    dueAt: loan.dueAt.toISOString(),
    returnedAt: loan.returnedAt?.toISOString() ?? null,
    renewalCount: loan.renewalCount,
    overdue: loan.status === 'ACTIVE' && isOverdue(loan.dueAt, at),
  };
}

export function formatCopy(copy: Copy): CopyApi {
  return {
    copyId: copy.copyId,
    bookId: copy.bookId,
    status: copy.status,
    state: copyStateOf(copy.status),
    currentLoanId: copy.currentLoanId,
  };
}

function formatReceipt(receipt: ReturnReceipt) {
  return {
    ...receipt,
    checkedOutAt: receipt.checkedOutAt.toISOString(),
    dueAt: receipt.dueAt.toISOString(),
    returnedAt: receipt.returnedAt.toISOString(),
  };
}

function formatEntry(entry: LoanEntry) {
  return {
    version: entry.version,
    entryType: entry.entryType,
    status: entry.status,
    dueAt: entry.dueAt.toISOString(),
    returnedAt: entry.returnedAt?.toISOString() ?? null,
    renewalCount: entry.renewalCount,
    recordedAt: entry.recordedAt.toISOString(),
  };
}

function formatAuditEvent(event: AuditEvent) {
  return { ...event, occurredAt: event.occurredAt.toISOString() };
}

function formatAuditGap(gap: AuditGap) {
  return { ...gap, detectedAt: gap.detectedAt.toISOString() };
}

/**
 * Engine context for a write. The adapter has already rejected writes
 * without an Idempotency-Key.
 */
function operationContext(request: FastifyRequest, idempotencyKey: string | null): OperationContext {
  if (idempotencyKey === null) throw internal('Idempotency-Key missing on a write route');
  return {
    actor: actorOf(request),
    idempotencyKey,
    correlationId: request.requestId,
    deadline: request.deadline,
  };
}

// ============================================================================
// Routes
// ============================================================================

export async function circulationRoutes(
  fastify: FastifyInstance,
  opts: CirculationRoutesOptions,
): Promise<void> {
  const PREFIX = '/circulation';
  const { engine, queries, now } = opts;
  const routes = contract.circulation;

  // ── Writes ───────────────────────────────────────────────────────────

  registerContractRoute(fastify, routes.checkout, PREFIX, {
    preHandler: [requireMember],
    successStatus: 201,
    handler: async (request, { body, idempotencyKey }) => {
      const loan = await engine.checkout(body.copyId, body.userId, operationContext(request, idempotencyKey));
      return { loan: formatLoan(loan, now()) };
    },
  });

  registerContractRoute(fastify, routes.returnCopy, PREFIX, {
    preHandler: [requireMember],
    handler: async (request, { body, idempotencyKey }) => {
      const receipt = await engine.returnCopy(body.copyId, body.userId, operationContext(request, idempotencyKey));
      return { receipt: formatReceipt(receipt) };
    },
  });

  registerContractRoute(fastify, routes.renew, PREFIX, {
    preHandler: [requireMember],
    handler: async (request, { params, idempotencyKey }) => {
      const renewal = await engine.renew(params.loanId, operationContext(request, idempotencyKey));
      return {
        loanId: renewal.loanId,
        dueAt: renewal.dueAt.toISOString(),
        renewalCount: renewal.renewalCount,
      };
    },
  });

  registerContractRoute(fastify, routes.reportLost, PREFIX, {
    preHandler: [requireAdmin],
    handler: async (request, { params, idempotencyKey }) => {
      const report = await engine.reportLost(params.copyId, operationContext(request, idempotencyKey));
      return { copy: formatCopy(report.copy), loan: formatLoan(report.loan, now()) };
    },
  });

  registerContractRoute(fastify, routes.retireCopy, PREFIX, {
    preHandler: [requireAdmin],
    handler: async (request, { params, idempotencyKey }) => {
      const copy = await engine.retireCopy(params.copyId, operationContext(request, idempotencyKey));
      return { copy: formatCopy(copy) };
    },
  });

  // ── Reads ────────────────────────────────────────────────────────────

  registerContractRoute(fastify, routes.getCopy, PREFIX, {
    preHandler: [requireMember],
    handler: async (_request, { params }) => {
      const copy = await queries.getCopy(params.copyId);
      return { copy };
    },
  });

  registerContractRoute(fastify, routes.getActiveLoan, PREFIX, {
    preHandler: [requireMember],
    handler: async (_request, { params }) => {
      const loan = await queries.getActiveLoan(params.copyId);
      return { loan: formatLoan(loan, now()) };
    },
  });

  registerContractRoute(fastify, routes.listLoans, PREFIX, {
    preHandler: [requireMember],
    handler: async (request, { params }) => {
      const loans = await queries.listLoans(params.userId, actorOf(request));
      const at = now();
      return { loans: loans.map(l => formatLoan(l, at)) };
    },
  });

  registerContractRoute(fastify, routes.getLoanHistory, PREFIX, {
    preHandler: [requireMember],
    handler: async (request, { params }) => {
      const history = await queries.getLoanHistory(params.loanId, actorOf(request));
      return {
        loan: formatLoan(history.loan, now()),
        entries: history.entries.map(formatEntry),
      };
    },
  });

  registerContractRoute(fastify, routes.listAuditEvents, PREFIX, {
    preHandler: [requireAdmin],
    handler: async (request, { query }) => {
      const events = await queries.listAuditEvents(query.entityType, query.entityId, actorOf(request));
      return { events: events.map(formatAuditEvent) };
    },
  });

  registerContractRoute(fastify, routes.listAuditGaps, PREFIX, {
    preHandler: [requireAdmin],
    handler: async request => {
      const gaps = await queries.listAuditGaps(actorOf(request));
      return { gaps: gaps.map(formatAuditGap) };
    },
  });
}
