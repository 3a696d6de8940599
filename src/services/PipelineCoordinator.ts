import type { Observation } from '../domain/entities/Observation.js';
import type { RawSample } from '../domain/entities/RawSample.js';
import type { Actor, RequestContext } from '../domain/entities/AuditEntry.js';
import { validateSample } from '../domain/validation.js';
import type { ValidationResult } from '../domain/validation.js';
import type { PayloadError } from '../domain/errors.js';
import {
  StoreError,
  StoreUnavailableError,
  ValidationError,
  describeError,
} from '../domain/errors.js';
import type { ObservationStore } from '../infra/repositories/ObservationStore.js';
import { logger } from '../infra/logger.js';
import type { AuditService } from './AuditService.js';
import type { BroadcastHub } from './BroadcastHub.js';
import { KeyedSerialQueue } from './KeyedSerialQueue.js';

export type PipelineStage = 'received' | 'validated' | 'persisted' | 'audited' | 'broadcast' | 'done';

export type PipelineRun =
  | {
      state: 'done';
      observation: Observation;
      stages: PipelineStage[];
      audited: boolean;
      deliveredTo: number;
    }
  | {
      state: 'failed';
      /** Stage that was being attempted when the run failed. */
      stage: PipelineStage;
      error: ValidationError | PayloadError | StoreError;
      stages: PipelineStage[];
      audited: boolean;
    };

export interface IngestContext {
  actor: Actor;
  requestContext?: RequestContext;
  /** Names the entry point in logs and audit metadata (http, serial:/dev/ttyUSB0, ...). */
  source: string;
}

const RESOURCE_TYPE = 'Observation';

/**
 * PipelineCoordinator - runs one sample through validate → persist → audit → broadcast
 *
 * - Nothing is broadcast before it is durably stored.
 * - Every run writes exactly one CREATE audit entry, accepted or rejected.
 * - Store failures are reported to the caller, never retried here.
 * - Samples from the same device are processed strictly in arrival order;
 *   different devices proceed concurrently.
 */
export class PipelineCoordinator {
  private queue = new KeyedSerialQueue();
  private validate: (sample: RawSample) => ValidationResult;

  constructor(
    private deps: {
      store: ObservationStore;
      audit: AuditService;
      hub: BroadcastHub;
      validate?: (sample: RawSample) => ValidationResult;
    }
  ) {
    this.validate = deps.validate ?? ((sample) => validateSample(sample));
  }

  run(sample: RawSample, context: IngestContext): Promise<PipelineRun> {
    return this.queue.run(sample.deviceId, () => this.process(sample, context));
  }

  /**
   * Ingest boundary: resolves with the stored observation, or rejects with
   * the ValidationError / StoreError that stopped the run.
   */
  async submit(sample: RawSample, context: IngestContext): Promise<Observation> {
    const result = await this.run(sample, context);
    if (result.state === 'failed') {
      throw result.error;
    }
    return result.observation;
  }

  /**
   * Audit an ingest attempt whose payload never became a RawSample.
   */
  async reject(error: ValidationError | PayloadError, context: IngestContext): Promise<PipelineRun> {
    const audited = await this.deps.audit.record({
      actor: context.actor,
      action: 'CREATE',
      resourceType: RESOURCE_TYPE,
      requestContext: context.requestContext,
      statusCode: error.statusCode,
      errorMessage: error.message,
      metadata: { source: context.source, constraint: error.constraint },
    });

    logger.warn('Ingest payload rejected', { source: context.source, error: error.message });
    return { state: 'failed', stage: 'received', error, stages: ['received'], audited };
  }

  private async process(sample: RawSample, context: IngestContext): Promise<PipelineRun> {
    const stages: PipelineStage[] = ['received'];

    const validation = this.validate(sample);
    if (!validation.ok) {
      const { error } = validation;
      const audited = await this.deps.audit.record({
        actor: context.actor,
        action: 'CREATE',
        resourceType: RESOURCE_TYPE,
        patientId: nonEmpty(sample.patientId),
        requestContext: context.requestContext,
        statusCode: error.statusCode,
        errorMessage: error.message,
        metadata: {
          source: context.source,
          deviceId: sample.deviceId,
          code: sample.code,
          constraint: error.constraint,
          field: error.field,
          value: error.value,
        },
      });

      logger.warn('Sample rejected by validation', {
        source: context.source,
        deviceId: sample.deviceId,
        constraint: error.constraint,
        value: error.value,
      });
      return { state: 'failed', stage: 'validated', error, stages, audited };
    }

    const observation = validation.observation;
    stages.push('validated');

    try {
      await this.deps.store.insert(observation);
    } catch (caught) {
      const error =
        caught instanceof StoreError
          ? caught
          : new StoreUnavailableError(`Observation store failed: ${describeError(caught)}`);

      const audited = await this.deps.audit.record({
        actor: context.actor,
        action: 'CREATE',
        resourceType: RESOURCE_TYPE,
        resourceId: observation.id,
        patientId: observation.patientId,
        requestContext: context.requestContext,
        statusCode: error.statusCode,
        errorMessage: error.message,
        metadata: { source: context.source, deviceId: observation.deviceId, retryable: error.retryable },
      });

      logger.error('Failed to persist observation', {
        source: context.source,
        observationId: observation.id,
        code: error.code,
        error: error.message,
      });
      return { state: 'failed', stage: 'persisted', error, stages, audited };
    }
    stages.push('persisted');

    const audited = await this.deps.audit.record({
      actor: context.actor,
      action: 'CREATE',
      resourceType: RESOURCE_TYPE,
      resourceId: observation.id,
      patientId: observation.patientId,
      requestContext: context.requestContext,
      statusCode: 201,
      metadata: {
        source: context.source,
        deviceId: observation.deviceId,
        code: observation.code,
        value: observation.value,
        effectiveTime: observation.effectiveTime.toISOString(),
      },
    });
    stages.push('audited');

    const deliveredTo = this.deps.hub.publish(observation);
    stages.push('broadcast', 'done');

    logger.debug('Observation accepted', {
      source: context.source,
      observationId: observation.id,
      deviceId: observation.deviceId,
      audited,
      deliveredTo,
    });

    return { state: 'done', observation, stages, audited, deliveredTo };
  }
}

function nonEmpty(value: string): string | null {
  return value.trim().length > 0 ? value : null;
}
