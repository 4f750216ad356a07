import type { QueryResultRow } from 'pg';
import { BaseRepository } from '../../connections/db/base.repository';
import type { Queryable } from '../../connections/db/queryable';
import type {
  AuditLog,
  AuditLogFilter,
  CreateAuditLogInput,
  UpdateAuditLogInput,
} from '../../connections/db/models';
import { auditLog } from '../../utils/logging';
import { createAuditLogSchema, updateAuditLogSchema } from './audit-logs.validation';

const parseMetadata = (value: unknown): Record<string, unknown> => {
  if (typeof value !== 'string' || value.length === 0) {
    return {};
  }
  const parsed: unknown = JSON.parse(value);
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
};

export class AuditLogRepository extends BaseRepository<
  AuditLog,
  CreateAuditLogInput,
  UpdateAuditLogInput,
  AuditLogFilter
> {
  constructor(db: Queryable) {
    super(db, {
      table: 'audit_logs',
      entity: 'Audit log',
      createSchema: createAuditLogSchema,
      updateSchema: updateAuditLogSchema,
      filterColumns: ['actor_id', 'action', 'entity_type', 'entity_id'],
      touchUpdatedAt: false,
    });
  }

  protected mapRow(row: QueryResultRow): AuditLog {
    return {
      id: row.id,
      actor_id: row.actor_id ?? null,
      action: row.action,
      entity_type: row.entity_type,
      entity_id: row.entity_id ?? null,
      metadata: parseMetadata(row.metadata),
      created_at: row.created_at,
    };
  }

  protected async toCreateColumns(input: CreateAuditLogInput): Promise<Record<string, unknown>> {
    return {
      actor_id: input.actor_id ?? null,
      action: input.action,
      entity_type: input.entity_type,
      entity_id: input.entity_id ?? null,
      metadata: JSON.stringify(input.metadata ?? {}),
    };
  }

  /** Persist an audit entry and mirror it to the application log. */
  async record(entry: CreateAuditLogInput, tx?: Queryable): Promise<AuditLog> {
    const saved = await this.create(entry, tx);
    auditLog(`${entry.action} ${entry.entity_type}`, {
      actorId: saved.actor_id,
      entityId: saved.entity_id,
    });
    return saved;
  }
}
