export type AuditAction = 'create' | 'update' | 'delete';

export interface AuditLog {
  id: number;
  actor_id: number | null;
  action: AuditAction;
  entity_type: string;
  entity_id: number | null;
  metadata: Record<string, unknown>;
  created_at: Date;
}

export interface CreateAuditLogInput {
  actor_id?: number | null;
  action: AuditAction;
  entity_type: string;
  entity_id?: number | null;
  metadata?: Record<string, unknown>;
}

export type UpdateAuditLogInput = Record<string, never>;

export interface AuditLogFilter {
  actor_id: number;
  action: AuditAction;
  entity_type: string;
  entity_id: number;
}
