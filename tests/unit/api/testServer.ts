import type { Server } from 'node:http';
import { createApp } from '../../../src/app.js';
import { AuditService } from '../../../src/services/AuditService.js';
import { BroadcastHub } from '../../../src/services/BroadcastHub.js';
import { ObservationService } from '../../../src/services/ObservationService.js';
import { PipelineCoordinator } from '../../../src/services/PipelineCoordinator.js';
import { MlService } from '../../../src/services/MlService.js';
import type { MlClient } from '../../../src/infra/ml/MlClient.js';
import { InMemoryAuditRecorder } from '../../../src/infra/repositories/InMemoryAuditRecorder.js';
import { FlakyObservationStore } from '../fixtures.js';

export interface TestServer {
  baseUrl: string;
  port: number;
  server: Server;
  store: FlakyObservationStore;
  recorder: InMemoryAuditRecorder;
  hub: BroadcastHub;
  auditService: AuditService;
  close(): Promise<void>;
}

/**
 * Start the real Express app on an ephemeral loopback port with in-memory storage.
 * Without an ML client the /api/ml routes answer ML_NOT_CONFIGURED.
 */
export async function startTestServer(options: { mlClient?: MlClient } = {}): Promise<TestServer> {
  const store = new FlakyObservationStore();
  const recorder = new InMemoryAuditRecorder();
  const hub = new BroadcastHub({ queueCapacity: 8 });
  const auditService = new AuditService(recorder);
  const observationService = new ObservationService(store, auditService);
  const coordinator = new PipelineCoordinator({ store, audit: auditService, hub });
  const mlService = new MlService(options.mlClient ?? null, auditService);

  const app = createApp({
    env: { NODE_ENV: 'test', SSE_HEARTBEAT_MS: 30_000, STORAGE_BACKEND: 'memory' },
    store,
    coordinator,
    observationService,
    auditService,
    hub,
    mlService,
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    port: address.port,
    server,
    store,
    recorder,
    hub,
    auditService,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export function postJson(url: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

export const ADMIN_HEADERS = { 'x-actor-id': 'admin-1', 'x-actor-role': 'admin' };
export const USER_HEADERS = { 'x-actor-id': 'nurse-7', 'x-actor-role': 'user' };
export const DEVICE_HEADERS = { 'x-actor-id': 'gateway-device-9', 'x-actor-role': 'device' };
