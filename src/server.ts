import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import type { Env } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { ObservationRepository } from './infra/repositories/ObservationRepository.js';
import { AuditRepository } from './infra/repositories/AuditRepository.js';
import { InMemoryObservationStore } from './infra/repositories/InMemoryObservationStore.js';
import { InMemoryAuditRecorder } from './infra/repositories/InMemoryAuditRecorder.js';
import type { ObservationStore } from './infra/repositories/ObservationStore.js';
import type { AuditRecorder } from './infra/repositories/AuditRecorder.js';
import type { ReadingSource } from './infra/sources/ReadingSource.js';
import { SerialReadingSource, createSerialConnector } from './infra/sources/SerialReadingSource.js';
import { SimulatedReadingSource } from './infra/sources/SimulatedReadingSource.js';
import { HttpMlClient } from './infra/ml/HttpMlClient.js';
import { AuditService } from './services/AuditService.js';
import { BroadcastHub } from './services/BroadcastHub.js';
import { ObservationService } from './services/ObservationService.js';
import { MlService } from './services/MlService.js';
import { PipelineCoordinator } from './services/PipelineCoordinator.js';
import { SourceRunner } from './services/SourceRunner.js';
import { StatsScheduler, startStatsScheduler } from './scheduler/StatsScheduler.js';
import { attachLiveSocket } from './api/liveSocket.js';
import { createApp } from './app.js';
import { ConfigError } from './domain/errors.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

interface Storage {
  store: ObservationStore;
  recorder: AuditRecorder;
  close(): void;
}

function createStorage(config: Env): Storage {
  if (config.STORAGE_BACKEND === 'memory') {
    loggerInstance.warn('Using in-memory storage; observations are lost on restart');
    return {
      store: new InMemoryObservationStore(),
      recorder: new InMemoryAuditRecorder(),
      close: () => {},
    };
  }

  const db = new DatabaseAdapter(config);
  return {
    store: new ObservationRepository(db),
    recorder: new AuditRepository(db),
    close: () => db.close(),
  };
}

function createReadingSource(config: Env): ReadingSource | null {
  const backoff = {
    initialDelayMs: config.SOURCE_BACKOFF_INITIAL_MS,
    maxDelayMs: config.SOURCE_BACKOFF_MAX_MS,
  };

  switch (config.SOURCE) {
    case 'serial': {
      const portPath = config.SERIAL_PORT;
      if (!portPath) {
        throw new ConfigError('SERIAL_PORT is required when SOURCE=serial');
      }
      return new SerialReadingSource(createSerialConnector({ path: portPath, baudRate: config.SERIAL_BAUD }), {
        portPath,
        patientId: config.SERIAL_PATIENT_ID,
        deviceId: config.SERIAL_DEVICE_ID,
        unit: config.SERIAL_UNIT,
        backoff,
      });
    }
    case 'simulator':
      return new SimulatedReadingSource({
        patientId: config.SIMULATOR_PATIENT_ID,
        intervalMs: config.SIMULATOR_INTERVAL_MS,
      });
    case 'none':
      return null;
  }
}

// Initialize persistence
const storage = createStorage(env);

// Initialize services
const hub = new BroadcastHub({ queueCapacity: env.BROADCAST_QUEUE_CAPACITY });
const auditService = new AuditService(storage.recorder);
const observationService = new ObservationService(storage.store, auditService);
const coordinator = new PipelineCoordinator({ store: storage.store, audit: auditService, hub });
const mlClient = env.ML_SERVICE_URL
  ? new HttpMlClient(env.ML_SERVICE_URL, { timeoutMs: env.ML_SERVICE_TIMEOUT_MS })
  : null;
const mlService = new MlService(mlClient, auditService);

const app = createApp({
  env,
  store: storage.store,
  coordinator,
  observationService,
  auditService,
  hub,
  mlService,
});

const source = createReadingSource(env);
const runner = source ? new SourceRunner(source, coordinator) : null;
let statsScheduler: StatsScheduler | null = null;

// Start server
const server = app.listen(env.PORT, env.HOST, () => {
  loggerInstance.info('Server started', {
    host: env.HOST,
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    storage: env.STORAGE_BACKEND,
    source: env.SOURCE,
    mlService: env.ML_SERVICE_URL ?? 'not configured',
  });

  if (runner) {
    runner.start().catch((error: unknown) => {
      loggerInstance.error('Reading source runner failed', { error });
    });
  }

  if (env.STATS_INTERVAL_MINUTES > 0) {
    statsScheduler = startStatsScheduler(env.STATS_INTERVAL_MINUTES, storage.store, hub);
  }
});

const liveSocket = attachLiveSocket(server, { hub, auditService });

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  loggerInstance.info(`${signal} received, shutting down gracefully`);

  statsScheduler?.stop();
  if (runner) {
    await runner.stop();
  }

  for (const client of liveSocket.clients) {
    client.terminate();
  }
  liveSocket.close();

  server.close(() => {
    storage.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
  server.closeAllConnections();
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    loggerInstance.error('Shutdown failed', { error });
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    loggerInstance.error('Shutdown failed', { error });
    process.exit(1);
  });
});

export { app };
