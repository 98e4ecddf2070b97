/**
 * PostgreSQL Circulation Store
 *
 * Binds the ledgers to a pooled client for the lifetime of one transaction.
 * The lock timeout bounds every row-lock wait, so a caller's deadline
 * surfaces as TIMEOUT instead of a stall.
 */

import type { FastifyBaseLogger } from 'fastify';
import { type DatabasePool, type Queryable, transaction } from '../../db/index.js';
import { translateStorageError } from '../../lib/errors.js';
import type {
  CirculationTransaction,
  ICirculationStore,
  StoreTransactionOptions,
} from '../interfaces/store.js';
import { PostgresResourceLedger } from './copy.repository.js';
import { PostgresLoanLedger } from './loan.repository.js';
import { PostgresAuditLog } from './audit.repository.js';
import { PostgresIdempotencyStore } from './idempotency.repository.js';
import { PostgresMemberDirectory } from './member.repository.js';

function bindTransaction(client: Queryable): CirculationTransaction {
  let savepointSeq = 0;
  const loans = new PostgresLoanLedger(client);
  return {
    copies: new PostgresResourceLedger(client),
    loans,
    audit: new PostgresAuditLog(client),
    idempotency: new PostgresIdempotencyStore(client),
    members: new PostgresMemberDirectory(client, loans),
    async savepoint<T>(fn: () => Promise<T>): Promise<T> {
      const name = `sp_${++savepointSeq}`;
      await client.query(`SAVEPOINT ${name}`);
      try {
        const result = await fn();
        await client.query(`RELEASE SAVEPOINT ${name}`);
        return result;
      } catch (err) {
        await client.query(`ROLLBACK TO SAVEPOINT ${name}`);
        throw err;
      }
    },
  };
}

export class PostgresCirculationStore implements ICirculationStore {
  readonly copies: PostgresResourceLedger;
  readonly loans: PostgresLoanLedger;
  readonly audit: PostgresAuditLog;
  readonly idempotency: PostgresIdempotencyStore;

  constructor(
    private readonly pool: DatabasePool,
    private readonly logger: FastifyBaseLogger,
  ) {
    this.copies = new PostgresResourceLedger(pool);
    this.loans = new PostgresLoanLedger(pool);
    this.audit = new PostgresAuditLog(pool);
    this.idempotency = new PostgresIdempotencyStore(pool);
  }

  async transaction<T>(
    fn: (tx: CirculationTransaction) => Promise<T>,
    options: StoreTransactionOptions,
  ): Promise<T> {
    try {
      return await transaction(this.pool, client => fn(bindTransaction(client)), {
        lockTimeoutMs: options.lockTimeoutMs,
      });
    } catch (err) {
      const translated = translateStorageError(err);
      if (translated.kind === 'INTERNAL') {
        this.logger.error({ err, code: 'STORAGE_FAILURE' }, 'Circulation transaction failed');
      }
      throw translated;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
