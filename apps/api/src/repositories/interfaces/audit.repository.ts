/**
 * Audit Log Interface
 * Immutable, append-only audit events plus the reconciliation list of
 * committed transitions whose audit write failed.
 */

import type { AuditEntityType, AuditEvent, AuditGap } from '@circulation/domain';

export interface IAuditLog {
  append(event: AuditEvent): Promise<void>;
  listByEntity(entityType: AuditEntityType, entityId: string): Promise<AuditEvent[]>;
  recordGap(gap: AuditGap): Promise<void>;
  listGaps(): Promise<AuditGap[]>;
}
