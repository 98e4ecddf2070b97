/**
 * Idempotency Retention Purge
 *
 * Deletes idempotency records past their retention window. Request handling
 * already purges opportunistically; this job is for cron
 * (`npm run purge:idempotency`) so quiet deployments do not accumulate keys.
 */

import { loadConfig } from '../config.js';
import { createPool } from '../db/index.js';
import type { IIdempotencyStore } from '../repositories/index.js';
import { PostgresIdempotencyStore } from '../repositories/postgres/index.js';

export interface PurgeJobResult {
  purged: number;
  startedAt: string;
}

export async function runIdempotencyPurge(
  store: IIdempotencyStore,
  now: () => Date = () => new Date(),
): Promise<PurgeJobResult> {
  const startedAt = now();
  const purged = await store.purgeExpired(startedAt);
  return { purged, startedAt: startedAt.toISOString() };
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

async function main() {
  const pool = createPool(loadConfig().db);
  try {
    console.log(JSON.stringify({ code: 'IDEMPOTENCY_PURGE_START' }));
    const result = await runIdempotencyPurge(new PostgresIdempotencyStore(pool));
    console.log(JSON.stringify({ code: 'IDEMPOTENCY_PURGED', ...result }));
  } finally {
    await pool.end();
  }
}

// Run when invoked directly (not when imported by tests)
const isDirectRun = process.argv[1]?.includes('idempotency-purge');
if (isDirectRun) {
  main().catch((err) => {
    console.error(JSON.stringify({ code: 'IDEMPOTENCY_PURGE_FATAL', error: String(err) }));
    process.exit(1);
  });
}
