/**
 * Circulation route contracts.
 *
 * Checkout, return, renew, loss and retirement are idempotent writes; every
 * one of them requires an Idempotency-Key header.
 */

import { z } from 'zod';
import {
  AuditEntityType,
  CopyState,
  CopyStatus,
  LoanEntryType,
  LoanStatus,
  MemberRole,
} from '@circulation/domain';
import { defineRoute } from '../define-route.js';

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

const CopyIdSchema = z.string().min(1).max(64);
const MemberIdSchema = z.string().min(1).max(64);

export const LoanApiSchema = z.object({
  loanId: z.string().uuid(),
  copyId: z.string(),
  userId: z.string(),
  status: LoanStatus,
  checkedOutAt: z.string(),
  dueAt: z.string(),
  returnedAt: z.string().nullable(),
  renewalCount: z.number().int(),
  overdue: z.boolean(),
});
export type LoanApi = z.infer<typeof LoanApiSchema>;

export const CopyApiSchema = z.object({
  copyId: z.string(),
  bookId: z.string(),
  status: CopyStatus,
  state: CopyState,
  currentLoanId: z.string().uuid().nullable(),
});
export type CopyApi = z.infer<typeof CopyApiSchema>;

export const ReceiptApiSchema = z.object({
  loanId: z.string().uuid(),
  copyId: z.string(),
  userId: z.string(),
  checkedOutAt: z.string(),
  dueAt: z.string(),
  returnedAt: z.string(),
  overdue: z.boolean(),
});

export const LoanEntryApiSchema = z.object({
  version: z.number().int(),
  entryType: LoanEntryType,
  status: LoanStatus,
  dueAt: z.string(),
  returnedAt: z.string().nullable(),
  renewalCount: z.number().int(),
  recordedAt: z.string(),
});

export const AuditEventApiSchema = z.object({
  eventId: z.string().uuid(),
  entityType: AuditEntityType,
  entityId: z.string(),
  fromState: z.string().nullable(),
  toState: z.string(),
  actorUserId: z.string(),
  actorRole: MemberRole,
  correlationId: z.string(),
  occurredAt: z.string(),
});

export const AuditGapApiSchema = z.object({
  entityType: AuditEntityType,
  entityId: z.string(),
  fromState: z.string().nullable(),
  toState: z.string(),
  correlationId: z.string(),
  reason: z.string(),
  detectedAt: z.string(),
});

// ---------------------------------------------------------------------------
// Body / params / query schemas
// ---------------------------------------------------------------------------

export const CirculationBodySchema = z.object({
  copyId: CopyIdSchema,
  userId: MemberIdSchema,
}).strict();
export type CirculationBody = z.infer<typeof CirculationBodySchema>;

export const CopyParamsSchema = z.object({ copyId: CopyIdSchema });
export const LoanParamsSchema = z.object({ loanId: z.string().uuid() });
export const MemberParamsSchema = z.object({ userId: MemberIdSchema });

export const AuditQuerySchema = z.object({
  entityType: AuditEntityType,
  entityId: z.string().min(1).max(64),
});

// ---------------------------------------------------------------------------
// Route contracts
// ---------------------------------------------------------------------------

export const circulationRoutes = {
  checkout: defineRoute({
    method: 'POST' as const,
    path: '/circulation/checkouts',
    summary: 'Check out a copy to a member',
    body: CirculationBodySchema,
    idempotent: true,
    response: z.object({ loan: LoanApiSchema }),
  }),

  returnCopy: defineRoute({
    method: 'POST' as const,
    path: '/circulation/returns',
    summary: 'Return a loaned copy',
    body: CirculationBodySchema,
    idempotent: true,
    response: z.object({ receipt: ReceiptApiSchema }),
  }),

  renew: defineRoute({
    method: 'POST' as const,
    path: '/circulation/loans/:loanId/renew',
    summary: 'Renew an active loan',
    params: LoanParamsSchema,
    idempotent: true,
    response: z.object({
      loanId: z.string().uuid(),
      dueAt: z.string(),
      renewalCount: z.number().int(),
    }),
  }),

  reportLost: defineRoute({
    method: 'POST' as const,
    path: '/circulation/copies/:copyId/lost',
    summary: 'Report a loaned copy as lost (ADMIN)',
    params: CopyParamsSchema,
    idempotent: true,
    response: z.object({ copy: CopyApiSchema, loan: LoanApiSchema }),
  }),

  retireCopy: defineRoute({
    method: 'POST' as const,
    path: '/circulation/copies/:copyId/retire',
    summary: 'Retire an available copy (ADMIN)',
    params: CopyParamsSchema,
    idempotent: true,
    response: z.object({ copy: CopyApiSchema }),
  }),

  getCopy: defineRoute({
    method: 'GET' as const,
    path: '/circulation/copies/:copyId',
    summary: 'Get copy availability',
    params: CopyParamsSchema,
    response: z.object({ copy: CopyApiSchema }),
  }),

  getActiveLoan: defineRoute({
    method: 'GET' as const,
    path: '/circulation/copies/:copyId/active-loan',
    summary: 'Get the active loan of a copy',
    params: CopyParamsSchema,
    response: z.object({ loan: LoanApiSchema }),
  }),

  listLoans: defineRoute({
    method: 'GET' as const,
    path: '/circulation/members/:userId/loans',
    summary: 'List loans of a member',
    params: MemberParamsSchema,
    response: z.object({ loans: z.array(LoanApiSchema) }),
  }),

  getLoanHistory: defineRoute({
    method: 'GET' as const,
    path: '/circulation/loans/:loanId/history',
    summary: 'List ledger entries of a loan',
    params: LoanParamsSchema,
    response: z.object({ loan: LoanApiSchema, entries: z.array(LoanEntryApiSchema) }),
  }),

  listAuditEvents: defineRoute({
    method: 'GET' as const,
    path: '/circulation/audit',
    summary: 'List audit events of an entity (ADMIN)',
    query: AuditQuerySchema,
    response: z.object({ events: z.array(AuditEventApiSchema) }),
  }),

  listAuditGaps: defineRoute({
    method: 'GET' as const,
    path: '/circulation/audit/gaps',
    summary: 'List committed transitions whose audit write failed (ADMIN)',
    response: z.object({ gaps: z.array(AuditGapApiSchema) }),
  }),
};
