import type { Server } from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';
import type { Observation } from '../domain/entities/Observation.js';
import { systemActor } from '../domain/entities/AuditEntry.js';
import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { AuditService } from '../services/AuditService.js';
import type { BroadcastHub, SubscriberTransport } from '../services/BroadcastHub.js';
import { resolveActorFromHeaders } from './identity.js';
import { mapObservationToFhir } from './observationMapper.js';

export const LIVE_SOCKET_PATH = '/ws/live';

function createSocketTransport(ws: WebSocket): SubscriberTransport {
  return {
    send: (observation: Observation) =>
      new Promise((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error('WebSocket is not open'));
          return;
        }
        ws.send(JSON.stringify(mapObservationToFhir(observation)), (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
  };
}

/**
 * Attach the WebSocket live feed to an HTTP server.
 * Each connection holds one hub subscription for its lifetime; inbound messages are ignored.
 */
export function attachLiveSocket(
  server: Server,
  deps: { hub: BroadcastHub; auditService: AuditService }
): WebSocketServer {
  const wss = new WebSocketServer({ server, path: LIVE_SOCKET_PATH });

  wss.on('connection', async (ws, req) => {
    const actor = resolveActorFromHeaders(req.headers) ?? systemActor('anonymous');
    const handle = deps.hub.subscribe(createSocketTransport(ws), {
      label: `ws:${req.socket.remoteAddress ?? 'unknown'}`,
      onRemoved: () => ws.terminate(),
    });

    ws.on('close', () => deps.hub.unsubscribe(handle));
    ws.on('error', (error) => {
      logger.warn('Live socket error', { subscriberId: handle.id, error: describeError(error) });
    });

    await deps.auditService.record({
      actor,
      action: 'READ',
      resourceType: 'ObservationStream',
      requestContext: {
        ip: req.socket.remoteAddress ?? null,
        userAgent: req.headers['user-agent'] ?? null,
        path: req.url ?? LIVE_SOCKET_PATH,
      },
      statusCode: 101,
      metadata: { transport: 'websocket', subscriberId: handle.id },
    });
  });

  return wss;
}
