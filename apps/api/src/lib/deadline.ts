/**
 * Caller deadlines.
 *
 * A deadline is an absolute epoch-millisecond instant. It bounds both the
 * idempotency wait and the per-copy lock wait of a single operation.
 */

import { setTimeout as sleep } from 'node:timers/promises';

export type Deadline = number;

export function deadlineAfter(now: Date, budgetMs: number): Deadline {
  return now.getTime() + budgetMs;
}

export function remainingMs(deadline: Deadline, now: Date): number {
  return Math.max(0, deadline - now.getTime());
}


/**
 * Resolve a per-request budget from the X-Request-Deadline-Ms header.
 * Missing or malformed values fall back to the default; values are clamped to the max.
 */
export function resolveBudgetMs(header: string | undefined, defaultMs: number, maxMs: number): number {
  if (!header || !/^\d+$/.test(header)) return defaultMs;
  const parsed = parseInt(header, 10);
  if (parsed <= 0) return defaultMs;
  return Math.min(parsed, maxMs);
}

export { sleep };
