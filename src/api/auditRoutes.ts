import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AuditService } from '../services/AuditService.js';
import { readerActor, requestContextOf, requireRole } from './identity.js';
import { mapAuditEntryToResponse } from './observationMapper.js';
import { auditQuerySchema, parseQuery } from './queryParams.js';

/**
 * Audit route handler
 * HTTP layer delegates to AuditService
 */
export function createAuditRouter(auditService: AuditService): Router {
  const router = Router();

  /**
   * GET /api/audit - Recent audit entries, newest first (admin only)
   */
  router.get(
    '/',
    requireRole(auditService, 'AuditLog', 'admin'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { patientId, actorId, limit } = parseQuery(auditQuerySchema, req.query);
        const entries = await auditService.auditLog(
          { patientId, actorId },
          limit,
          readerActor(res),
          requestContextOf(req)
        );
        res.json({ entries: entries.map(mapAuditEntryToResponse) });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
