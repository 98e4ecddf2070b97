/**
 * PostgreSQL Audit Log
 * audit_event is append-only (UPDATE/DELETE blocked by trigger).
 */

import type { AuditEntityType, AuditEvent, AuditGap, MemberRole } from '@circulation/domain';
import type { Queryable } from '../../db/index.js';
import type { IAuditLog } from '../interfaces/audit.repository.js';

interface AuditEventRow {
  event_id: string;
  entity_type: AuditEntityType;
  entity_id: string;
  from_state: string | null;
  to_state: string;
  actor_user_id: string;
  actor_role: MemberRole;
  correlation_id: string;
  occurred_at: Date;
}

interface AuditGapRow {
  entity_type: AuditEntityType;
  entity_id: string;
  from_state: string | null;
  to_state: string;
  correlation_id: string;
  reason: string;
  detected_at: Date;
}

function mapAuditEventRow(row: AuditEventRow): AuditEvent {
  return {
    eventId: row.event_id,
    entityType: row.entity_type,
    entityId: row.entity_id,
    fromState: row.from_state,
    toState: row.to_state,
    actorUserId: row.actor_user_id,
    actorRole: row.actor_role,
    correlationId: row.correlation_id,
    occurredAt: row.occurred_at,
  };
}

function mapAuditGapRow(row: AuditGapRow): AuditGap {
  return {
    entityType: row.entity_type,
    entityId: row.entity_id,
    fromState: row.from_state,
    toState: row.to_state,
    correlationId: row.correlation_id,
    reason: row.reason,
    detectedAt: row.detected_at,
  };
}

export class PostgresAuditLog implements IAuditLog {
  constructor(private readonly db: Queryable) {}

  async append(event: AuditEvent): Promise<void> {
    await this.db.query(`
      INSERT INTO audit_event
        (event_id, entity_type, entity_id, from_state, to_state,
         actor_user_id, actor_role, correlation_id, occurred_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
    `, [
      event.eventId,
      event.entityType,
      event.entityId,
      event.fromState,
      event.toState,
      event.actorUserId,
      event.actorRole,
      event.correlationId,
      event.occurredAt,
    ]);
  }

  async listByEntity(entityType: AuditEntityType, entityId: string): Promise<AuditEvent[]> {
    const result = await this.db.query<AuditEventRow>(`
      SELECT * FROM audit_event
      WHERE entity_type = $1 AND entity_id = $2
      ORDER BY occurred_at ASC, event_id ASC
    `, [entityType, entityId]);

    return result.rows.map(mapAuditEventRow);
  }

  async recordGap(gap: AuditGap): Promise<void> {
    await this.db.query(`
      INSERT INTO audit_gap
        (entity_type, entity_id, from_state, to_state, correlation_id, reason, detected_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
    `, [
      gap.entityType,
      gap.entityId,
      gap.fromState,
      gap.toState,
      gap.correlationId,
      gap.reason,
      gap.detectedAt,
    ]);
  }

  async listGaps(): Promise<AuditGap[]> {
    const result = await this.db.query<AuditGapRow>(`
      SELECT entity_type, entity_id, from_state, to_state, correlation_id, reason, detected_at
      FROM audit_gap
      ORDER BY detected_at ASC, id ASC
    `);

    return result.rows.map(mapAuditGapRow);
  }
}
