import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import type { AuditService } from '../services/AuditService.js';
import type { MlService } from '../services/MlService.js';
import { readerActor, requestContextOf, requireRole } from './identity.js';
import { mlQuerySchema, parseQuery } from './queryParams.js';

const trainSchema = z.object({
  minSamples: z.number().int().positive().optional(),
});

/**
 * ML collaborator route handlers
 * HTTP layer delegates to MlService
 */
export function createMlRouter(deps: { mlService: MlService; auditService: AuditService }): Router {
  const router = Router();
  const { mlService } = deps;

  router.use(express.json());

  /**
   * GET /api/ml/predict - Classification and anomaly scores for recent readings
   */
  router.get('/predict', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(mlQuerySchema, req.query);
      res.json(await mlService.predict(query, readerActor(res), requestContextOf(req)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/ml/analysis - Aggregate pattern analysis
   */
  router.get('/analysis', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(mlQuerySchema, req.query);
      res.json({ analysis: await mlService.analyze(query, readerActor(res), requestContextOf(req)) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/ml/train - Start model training (admin only)
   */
  router.post(
    '/train',
    requireRole(deps.auditService, 'MlModel', 'admin'),
    async (req: Request, res: Response, next: NextFunction) => {
      const parsed = trainSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return next(
          new ValidationError('Invalid training payload', 'INVALID_PAYLOAD', 'minSamples', null, parsed.error.flatten())
        );
      }

      try {
        const message = await mlService.train(parsed.data.minSamples, readerActor(res), requestContextOf(req));
        res.json({ success: true, message });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/ml/health - Collaborator health, proxied
   */
  router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await mlService.health());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
