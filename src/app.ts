import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createApiRouter } from './api/index.js';
import { createIngestRouter } from './api/ingestRoutes.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { resolveIdentity } from './api/identity.js';
import type { Env } from './infra/env.js';
import { logger } from './infra/logger.js';
import type { ObservationStore } from './infra/repositories/ObservationStore.js';
import type { AuditService } from './services/AuditService.js';
import type { BroadcastHub } from './services/BroadcastHub.js';
import type { MlService } from './services/MlService.js';
import type { ObservationService } from './services/ObservationService.js';
import type { PipelineCoordinator } from './services/PipelineCoordinator.js';

export interface AppDependencies {
  env: Pick<Env, 'NODE_ENV' | 'SSE_HEARTBEAT_MS' | 'STORAGE_BACKEND'>;
  store: ObservationStore;
  coordinator: PipelineCoordinator;
  observationService: ObservationService;
  auditService: AuditService;
  hub: BroadcastHub;
  mlService: MlService;
}

/**
 * Build the Express application. No listening and no background work,
 * so tests can mount it on an ephemeral port.
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(cors());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.use(resolveIdentity());

  app.get('/health', async (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      storage: deps.env.STORAGE_BACKEND,
      mlService: await deps.mlService.status(),
    });
  });

  app.get('/ready', async (_req: Request, res: Response) => {
    const ready = await deps.store.healthCheck().catch(() => false);
    if (!ready) {
      res.status(503).json({ status: 'not-ready' });
      return;
    }
    res.json({ status: 'ready', subscribers: deps.hub.stats().subscribers });
  });

  // Device firmware posts here without gateway identity
  app.use('/ingest', createIngestRouter(deps.coordinator));

  app.use(
    '/api',
    createApiRouter({
      coordinator: deps.coordinator,
      observationService: deps.observationService,
      auditService: deps.auditService,
      hub: deps.hub,
      mlService: deps.mlService,
      heartbeatMs: deps.env.SSE_HEARTBEAT_MS,
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.env));

  return app;
}
