import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { Observation } from '../domain/entities/Observation.js';
import type { AuditService } from '../services/AuditService.js';
import type { BroadcastHub, SubscriberTransport } from '../services/BroadcastHub.js';
import { readerActor, requestContextOf } from './identity.js';
import { mapObservationToFhir } from './observationMapper.js';
import { parseQuery, streamQuerySchema } from './queryParams.js';

const DEFAULT_HEARTBEAT_MS = 30_000;

/**
 * Write one SSE event, resolving once the socket accepted it.
 * A full socket buffer holds the subscriber's pump until 'drain'.
 */
function writeSseEvent(res: Response, event: string, data: unknown): Promise<void> {
  return new Promise((resolve, reject) => {
    if (res.writableEnded || res.destroyed) {
      reject(new Error('SSE connection closed'));
      return;
    }

    if (res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`)) {
      resolve();
      return;
    }

    const cleanup = () => {
      res.off('drain', onDrain);
      res.off('close', onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onClose = () => {
      cleanup();
      reject(new Error('SSE connection closed'));
    };
    res.once('drain', onDrain);
    res.once('close', onClose);
  });
}

function createSseTransport(res: Response): SubscriberTransport {
  return {
    send: (observation: Observation) => writeSseEvent(res, 'observation', mapObservationToFhir(observation)),
  };
}

export function createStreamRouter(deps: {
  hub: BroadcastHub;
  auditService: AuditService;
  heartbeatMs?: number;
}): Router {
  const router = Router();
  const heartbeatMs = deps.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;

  /**
   * GET /api/stream - Server-Sent Events feed of accepted observations
   */
  router.get('/stream', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { patientId } = parseQuery(streamQuerySchema, req.query);

      await deps.auditService.record({
        actor: readerActor(res),
        action: 'READ',
        resourceType: 'ObservationStream',
        patientId: patientId ?? null,
        requestContext: requestContextOf(req),
        statusCode: 200,
        metadata: { transport: 'sse' },
      });

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no');
      res.flushHeaders();

      res.write('event: ready\n');
      res.write('data: {}\n\n');

      const handle = deps.hub.subscribe(createSseTransport(res), {
        label: `sse:${req.ip ?? 'unknown'}`,
        filter: patientId === undefined ? undefined : (observation) => observation.patientId === patientId,
        onRemoved: () => res.end(),
      });

      const heartbeat = setInterval(() => {
        res.write(': keep-alive\n\n');
      }, heartbeatMs);

      res.on('close', () => {
        clearInterval(heartbeat);
        deps.hub.unsubscribe(handle);
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
