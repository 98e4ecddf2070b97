/**
 * Codecs for cached operation results.
 *
 * Idempotency results are stored as JSON, so dates come back as ISO strings.
 * A replay decodes them into the same shape the first execution returned.
 */

import { z } from 'zod';
import {
  CopySchema,
  LoanSchema,
  type Copy,
  type LostReport,
  type Loan,
  type RenewalResult,
  type ReturnReceipt,
} from '@circulation/domain';
import { internal } from '../lib/errors.js';

const StoredCopy = CopySchema.extend({
  updatedAt: z.coerce.date(),
});

const StoredLoan = LoanSchema.extend({
  checkedOutAt: z.coerce.date(),
  dueAt: z.coerce.date(),
  returnedAt: z.coerce.date().nullable(),
});

const StoredReceipt = z.object({
  loanId: z.string(),
  copyId: z.string(),
  userId: z.string(),
  checkedOutAt: z.coerce.date(),
  dueAt: z.coerce.date(),
  returnedAt: z.coerce.date(),
  overdue: z.boolean(),
});

const StoredRenewal = z.object({
  loanId: z.string(),
  dueAt: z.coerce.date(),
  renewalCount: z.number().int(),
});

const StoredLostReport = z.object({
  copy: StoredCopy,
  loan: StoredLoan,
});

export interface ResultCodec<T> {
  decode(stored: unknown): T;
}

function codec<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): ResultCodec<T> {
  return {
    decode(stored) {
      const parsed = schema.safeParse(stored);
      if (!parsed.success) throw internal('Cached result is unreadable');
      return parsed.data;
    },
  };
}

export const loanCodec: ResultCodec<Loan> = codec(StoredLoan);
export const copyCodec: ResultCodec<Copy> = codec(StoredCopy);
export const receiptCodec: ResultCodec<ReturnReceipt> = codec(StoredReceipt);
export const renewalCodec: ResultCodec<RenewalResult> = codec(StoredRenewal);
export const lostReportCodec: ResultCodec<LostReport> = codec(StoredLostReport);
