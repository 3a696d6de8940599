import { Router } from 'express';
import { createIngestRouter } from './ingestRoutes.js';
import { createObservationRouter } from './observationRoutes.js';
import { createFhirRouter } from './fhirRoutes.js';
import { createAuditRouter } from './auditRoutes.js';
import { createStreamRouter } from './streamRoutes.js';
import { createMlRouter } from './mlRoutes.js';
import { requireRole } from './identity.js';
import type { PipelineCoordinator } from '../services/PipelineCoordinator.js';
import type { ObservationService } from '../services/ObservationService.js';
import type { AuditService } from '../services/AuditService.js';
import type { BroadcastHub } from '../services/BroadcastHub.js';
import type { MlService } from '../services/MlService.js';

/**
 * Main API router - composes all route handlers
 * Each route group in separate file
 * Dependencies injected from app.ts
 */
export function createApiRouter(deps: {
  coordinator: PipelineCoordinator;
  observationService: ObservationService;
  auditService: AuditService;
  hub: BroadcastHub;
  mlService: MlService;
  heartbeatMs?: number;
}): Router {
  const router = Router();

  router.use(
    '/ingest',
    requireRole(deps.auditService, 'Observation', 'admin', 'user', 'device'),
    createIngestRouter(deps.coordinator)
  );
  router.use('/observations', createObservationRouter(deps));
  router.use('/fhir', createFhirRouter(deps.observationService));
  router.use('/audit', createAuditRouter(deps.auditService));
  router.use('/ml', createMlRouter(deps));
  router.use(createStreamRouter(deps));

  return router;
}
