/**
 * Caller authorization over the identity supplied with each call.
 * Members act for themselves; admins act for anyone.
 */

import type { Actor } from '@circulation/domain';
import { forbidden } from '../lib/errors.js';

export function isAdmin(actor: Actor): boolean {
  return actor.role === 'ADMIN';
}

export function assertAdmin(actor: Actor): void {
  if (!isAdmin(actor)) {
    throw forbidden('ADMIN_ONLY', 'Only administrators may perform this operation');
  }
}

export function assertSelfOrAdmin(actor: Actor, userId: string): void {
  if (!isAdmin(actor) && actor.userId !== userId) {
    throw forbidden('NOT_SELF', 'Members may only act on their own account');
  }
}

export function assertLoanOwnerOrAdmin(actor: Actor, loanOwnerId: string): void {
  if (!isAdmin(actor) && actor.userId !== loanOwnerId) {
    throw forbidden('NOT_LOAN_OWNER', 'Loan belongs to another member');
  }
}
