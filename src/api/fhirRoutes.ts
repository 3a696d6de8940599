import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ObservationService } from '../services/ObservationService.js';
import { readerActor, requestContextOf } from './identity.js';
import { mapObservationsToBundle } from './observationMapper.js';
import { fhirQuerySchema, parseQuery } from './queryParams.js';

/**
 * FHIR read surface - Observation collection bundles, no search parameters beyond patient and limit
 */
export function createFhirRouter(observationService: ObservationService): Router {
  const router = Router();

  /**
   * GET /api/fhir/Observation?patient=&limit=
   */
  router.get('/Observation', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { patient, limit } = parseQuery(fhirQuerySchema, req.query);
      const observations = await observationService.query(
        { patientId: patient, limit },
        readerActor(res),
        requestContextOf(req)
      );
      res.type('application/fhir+json').json(mapObservationsToBundle(observations));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
