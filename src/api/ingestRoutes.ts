import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { deviceActor } from '../domain/entities/AuditEntry.js';
import { parseIngestPayload } from '../infra/sources/ingestPayload.js';
import type { PipelineCoordinator } from '../services/PipelineCoordinator.js';
import { toPayloadError } from './errorHandler.js';
import { getActor, requestContextOf } from './identity.js';
import { mapObservationToFhir } from './observationMapper.js';

const HTTP_SOURCE = 'http';
export const INGEST_BODY_LIMIT = '64kb';

/**
 * Ingest route handler - one POSTed reading through the pipeline
 * Mounted twice: public device ingest and the identity-gated API path
 */
export function createIngestRouter(coordinator: PipelineCoordinator): Router {
  const router = Router();

  router.use(express.json({ limit: INGEST_BODY_LIMIT }));

  /**
   * POST / - Submit one reading
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const requestContext = requestContextOf(req);
    const parsed = parseIngestPayload(req.body);

    try {
      if (!parsed.ok) {
        await coordinator.reject(parsed.error, {
          actor: getActor(res) ?? deviceActor(''),
          requestContext,
          source: HTTP_SOURCE,
        });
        throw parsed.error;
      }

      const { sample } = parsed;
      const observation = await coordinator.submit(sample, {
        actor: getActor(res) ?? deviceActor(sample.deviceId),
        requestContext,
        source: HTTP_SOURCE,
      });

      res.status(201).json({ id: observation.id, observation: mapObservationToFhir(observation) });
    } catch (error) {
      next(error);
    }
  });

  // A body the parser refused is still a submit and gets its CREATE audit entry
  router.use(async (err: Error, req: Request, res: Response, next: NextFunction) => {
    const rejection = toPayloadError(err);
    if (!rejection) {
      next(err);
      return;
    }

    try {
      await coordinator.reject(rejection, {
        actor: getActor(res) ?? deviceActor(''),
        requestContext: requestContextOf(req),
        source: HTTP_SOURCE,
      });
      next(rejection);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
