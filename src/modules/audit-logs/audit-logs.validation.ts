import { z } from 'zod';
import type { CreateAuditLogInput, UpdateAuditLogInput } from '../../connections/db/models';
import { foreignKey, idSchema, listQuerySchema } from '../../utils/validation';

const actionSchema = z.enum(['create', 'update', 'delete']);

export const createAuditLogSchema: z.ZodType<CreateAuditLogInput> = z.object({
  actor_id: foreignKey.nullable().optional(),
  action: actionSchema,
  entity_type: z.string().trim().min(1).max(50),
  entity_id: foreignKey.nullable().optional(),
  metadata: z.record(z.unknown()).optional(),
});

// Audit entries are append-only
export const updateAuditLogSchema: z.ZodType<UpdateAuditLogInput> = z.record(z.never());

export const auditLogQuerySchema = listQuerySchema.extend({
  actor_id: idSchema.optional(),
  action: actionSchema.optional(),
  entity_type: z.string().optional(),
  entity_id: idSchema.optional(),
});
