import type { NextFunction, Request, Response } from 'express';
import type { AuditAction } from '../connections/db/models';
import type { AuditLogRepository } from '../modules/audit-logs/audit-logs.repository';
import { logger } from '../utils/logging';

const ACTIONS: Partial<Record<string, AuditAction>> = {
  POST: 'create',
  PUT: 'update',
  PATCH: 'update',
  DELETE: 'delete',
};

/**
 * Records successful mutations on the router it is mounted on into audit_logs.
 * Handlers report the affected id through `res.locals.entityId`.
 */
export const auditTrail = (auditLogs: AuditLogRepository, entityType: string) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const action = ACTIONS[req.method];
    if (!action) {
      return next();
    }

    res.on('finish', () => {
      if (res.statusCode >= 400) {
        return;
      }

      const entityId: unknown = res.locals.entityId;
      auditLogs
        .record({
          actor_id: req.user?.id ?? null,
          action,
          entity_type: entityType,
          entity_id: typeof entityId === 'number' ? entityId : null,
          metadata: {
            method: req.method,
            path: req.originalUrl,
            status: res.statusCode,
          },
        })
        .catch((error: unknown) => {
          logger.error('Failed to write audit log', {
            entityType,
            action,
            error: error instanceof Error ? error.message : String(error),
          });
        });
    });

    next();
  };
};
