import type { Observation } from '../../src/domain/entities/Observation.js';
import type { RawSample } from '../../src/domain/entities/RawSample.js';
import type { AuditEntry, AuditFilter } from '../../src/domain/entities/AuditEntry.js';
import { AuditError } from '../../src/domain/errors.js';
import type { StoreError } from '../../src/domain/errors.js';
import type { AuditRecorder } from '../../src/infra/repositories/AuditRecorder.js';
import { InMemoryObservationStore } from '../../src/infra/repositories/InMemoryObservationStore.js';
import type { SubscriberTransport } from '../../src/services/BroadcastHub.js';
import type {
  MlAnalysis,
  MlClient,
  MlHealth,
  MlPredictionReport,
  MlWindow,
} from '../../src/infra/ml/MlClient.js';

export const OBSERVED_AT = new Date('2024-05-01T10:00:00.000Z');
export const RECORDED_AT = new Date('2024-05-01T10:00:01.000Z');

export function sampleOf(overrides: Partial<RawSample> = {}): RawSample {
  return {
    patientId: 'p1',
    deviceId: 'dev-1',
    code: 'sound',
    value: 245,
    unit: 'au',
    observedAt: OBSERVED_AT,
    ...overrides,
  };
}

export function observationOf(overrides: Partial<Observation> = {}): Observation {
  return {
    id: 'obs-1',
    patientId: 'p1',
    deviceId: 'dev-1',
    code: 'sound',
    value: 245,
    unit: 'au',
    effectiveTime: OBSERVED_AT,
    status: 'final',
    recordedAt: RECORDED_AT,
    ...overrides,
  };
}

/**
 * In-memory store whose inserts can be made to fail on demand
 */
export class FlakyObservationStore extends InMemoryObservationStore {
  insertFailure: StoreError | null = null;
  readFailure: StoreError | null = null;

  async insert(observation: Observation): Promise<void> {
    if (this.insertFailure) throw this.insertFailure;
    return super.insert(observation);
  }

  async getById(id: string): Promise<Observation | null> {
    if (this.readFailure) throw this.readFailure;
    return super.getById(id);
  }
}

export class FailingAuditRecorder implements AuditRecorder {
  attempts = 0;

  async record(entry: AuditEntry): Promise<void> {
    this.attempts += 1;
    throw new AuditError(`Failed to record audit entry ${entry.id}`);
  }

  async list(_filter: AuditFilter, _limit: number): Promise<AuditEntry[]> {
    return [];
  }
}

/**
 * Transport that records everything it is asked to send
 */
export class RecordingTransport implements SubscriberTransport {
  received: Observation[] = [];

  async send(observation: Observation): Promise<void> {
    this.received.push(observation);
  }
}

/**
 * Transport whose sends stay pending until released
 */
export class GatedTransport implements SubscriberTransport {
  received: Observation[] = [];
  private releases: Array<() => void> = [];

  send(observation: Observation): Promise<void> {
    this.received.push(observation);
    return new Promise((resolve) => {
      this.releases.push(resolve);
    });
  }

  releaseAll(): void {
    const pending = this.releases;
    this.releases = [];
    pending.forEach((release) => release());
  }

  get pending(): number {
    return this.releases.length;
  }
}

export class FailingTransport implements SubscriberTransport {
  attempts = 0;

  async send(_observation: Observation): Promise<void> {
    this.attempts += 1;
    throw new Error('client went away');
  }
}

export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

/**
 * In-process ML collaborator with canned answers
 */
export class FakeMlClient implements MlClient {
  failure: Error | null = null;
  windows: MlWindow[] = [];
  trainedWith: number[] = [];

  async predict(window: MlWindow): Promise<MlPredictionReport> {
    this.windows.push(window);
    if (this.failure) throw this.failure;
    return {
      totalReadings: 1,
      predictions: [
        {
          value: 245,
          timestamp: '2024-05-01T09:59:00.000Z',
          categoryRule: 'moderate',
          categoryMl: null,
          categoryConfidence: null,
          isAnomaly: false,
          anomalyScore: 0.1,
        },
      ],
      summary: { totalReadings: 1, avgValue: 245, maxValue: 245, minValue: 245, anomalyCount: 0 },
    };
  }

  async analyze(window: MlWindow): Promise<MlAnalysis> {
    this.windows.push(window);
    if (this.failure) throw this.failure;
    return {
      totalReadings: 1,
      avgLevel: 245,
      stdLevel: 0,
      minLevel: 245,
      maxLevel: 245,
      anomalyCount: 0,
      anomalyPercentage: 0,
      peakHour: 9,
      quietestHour: 9,
    };
  }

  async train(minSamples: number): Promise<string> {
    this.trainedWith.push(minSamples);
    if (this.failure) throw this.failure;
    return 'Training started';
  }

  async health(): Promise<MlHealth> {
    if (this.failure) throw this.failure;
    return { status: 'healthy', databaseConnected: true, classifierLoaded: true, anomalyDetectorLoaded: false };
  }
}
