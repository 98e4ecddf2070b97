/**
 * In-memory Audit Log
 */

import type { AuditEntityType, AuditEvent, AuditGap } from '@circulation/domain';
import type { IAuditLog } from '../interfaces/audit.repository.js';
import type { AppendRows } from './tables.js';

export class MemoryAuditLog implements IAuditLog {
  constructor(
    private readonly events: AppendRows<AuditEvent>,
    private readonly gaps: AppendRows<AuditGap>,
  ) {}

  async append(event: AuditEvent): Promise<void> {
    this.events.append({ ...event });
  }

  async listByEntity(entityType: AuditEntityType, entityId: string): Promise<AuditEvent[]> {
    return this.events
      .all()
      .filter(e => e.entityType === entityType && e.entityId === entityId)
      .map(e => ({ ...e }));
  }

  async recordGap(gap: AuditGap): Promise<void> {
    this.gaps.append({ ...gap });
  }

  async listGaps(): Promise<AuditGap[]> {
    return this.gaps.all().map(g => ({ ...g }));
  }
}
