/**
 * Audit Emitter
 *
 * Appends one AuditEvent per entity transition, inside the transaction that
 * performs it, so the event is durable before the idempotency record is
 * completed. Each append runs under a savepoint: if the audit sink fails the
 * transition still commits, and the missing event is flagged in audit_gap
 * for reconciliation.
 */

import { randomUUID } from 'crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { Actor, AuditEntityType, AuditGap } from '@circulation/domain';
import type { CirculationTransaction, IAuditLog } from '../repositories/index.js';

export interface EntityTransition {
  entityType: AuditEntityType;
  entityId: string;
  fromState: string | null;
  toState: string;
}

export class AuditEmitter {
  constructor(
    private readonly log: IAuditLog,
    private readonly logger: FastifyBaseLogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Record a transition. Returns the gap to flag when the append failed.
   */
  async record(
    tx: CirculationTransaction,
    transition: EntityTransition,
    actor: Actor,
    correlationId: string,
  ): Promise<AuditGap | null> {
    const occurredAt = this.now();
    try {
      await tx.savepoint(() => tx.audit.append({
        eventId: randomUUID(),
        entityType: transition.entityType,
        entityId: transition.entityId,
        fromState: transition.fromState,
        toState: transition.toState,
        actorUserId: actor.userId,
        actorRole: actor.role,
        correlationId,
        occurredAt,
      }));
      return null;
    } catch (err) {
      this.logger.error({
        err,
        code: 'AUDIT_GAP',
        entityType: transition.entityType,
        entityId: transition.entityId,
        correlationId,
      }, 'Audit append failed; transition proceeds');
      return {
        ...transition,
        correlationId,
        reason: 'AUDIT_APPEND_FAILED',
        detectedAt: occurredAt,
      };
    }
  }

  /**
   * Persist gaps collected during a committed transition. Failures are logged;
   * the log line is then the only trace of the gap.
   */
  async flagGaps(gaps: AuditGap[]): Promise<void> {
    for (const gap of gaps) {
      try {
        await this.log.recordGap(gap);
      } catch (err) {
        this.logger.error({ err, code: 'AUDIT_GAP', gap }, 'Failed to flag audit gap');
      }
    }
  }
}
