import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import type { AuditService } from '../services/AuditService.js';
import type { ObservationService } from '../services/ObservationService.js';
import { readerActor, requestContextOf, requireRole } from './identity.js';
import { mapObservationToResponse } from './observationMapper.js';
import { observationQuerySchema, parseQuery } from './queryParams.js';

const statusChangeSchema = z.object({
  status: z.enum(['registered', 'preliminary', 'final', 'amended']),
});

/**
 * Observation route handlers
 * HTTP layer delegates to ObservationService
 */
export function createObservationRouter(deps: {
  observationService: ObservationService;
  auditService: AuditService;
}): Router {
  const router = Router();
  const { observationService } = deps;

  router.use(express.json());

  /**
   * GET /api/observations - Most recent observations first
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(observationQuerySchema, req.query);
      const observations = await observationService.query(query, readerActor(res), requestContextOf(req));
      res.json({ observations: observations.map(mapObservationToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/observations/count - Total stored observations
   */
  router.get('/count', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ count: await observationService.count() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/observations/:id - Single observation
   */
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const observation = await observationService.getObservation(
        req.params.id,
        readerActor(res),
        requestContextOf(req)
      );
      res.json({ observation: mapObservationToResponse(observation) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /api/observations/:id/status - Correct an observation's status
   */
  router.patch(
    '/:id/status',
    requireRole(deps.auditService, 'Observation', 'admin', 'user'),
    async (req: Request, res: Response, next: NextFunction) => {
      const parsed = statusChangeSchema.safeParse(req.body);
      if (!parsed.success) {
        return next(
          new ValidationError('Invalid status payload', 'INVALID_PAYLOAD', 'status', null, parsed.error.flatten())
        );
      }

      try {
        const observation = await observationService.transitionStatus(
          req.params.id,
          parsed.data.status,
          readerActor(res),
          requestContextOf(req)
        );
        res.json({ observation: mapObservationToResponse(observation) });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
