import type { Observation, ObservationStatus } from '../domain/entities/Observation.js';
import { canTransitionStatus } from '../domain/entities/Observation.js';
import type { Actor, RequestContext } from '../domain/entities/AuditEntry.js';
import { NotFoundError, ValidationError, describeError, isAppError } from '../domain/errors.js';
import type { ObservationFilter, ObservationStore } from '../infra/repositories/ObservationStore.js';
import { logger } from '../infra/logger.js';
import type { AuditService } from './AuditService.js';
import { clampLimit } from './AuditService.js';

export const OBSERVATION_DEFAULT_LIMIT = 100;
export const OBSERVATION_MAX_LIMIT = 500;

export interface ObservationQuery {
  patientId?: string;
  deviceId?: string;
  since?: Date;
  limit?: number;
}

/**
 * ObservationService - read path and status corrections over the store
 * HTTP layer delegates here; every PHI access is audited
 */
export class ObservationService {
  constructor(
    private store: ObservationStore,
    private audit: AuditService
  ) {}

  async query(query: ObservationQuery, actor: Actor, requestContext?: RequestContext): Promise<Observation[]> {
    const filter: ObservationFilter = {
      patientId: query.patientId,
      deviceId: query.deviceId,
      since: query.since,
      limit: clampLimit(query.limit, OBSERVATION_DEFAULT_LIMIT, OBSERVATION_MAX_LIMIT),
    };
    const metadata = {
      deviceId: filter.deviceId ?? null,
      since: filter.since ? filter.since.toISOString() : null,
      limit: filter.limit,
    };

    let observations: Observation[];
    try {
      observations = await this.store.list(filter);
    } catch (error) {
      await this.recordRead(actor, requestContext, {
        patientId: filter.patientId ?? null,
        statusCode: isAppError(error) ? error.statusCode : 500,
        errorMessage: describeError(error),
        metadata,
      });
      throw error;
    }

    await this.recordRead(actor, requestContext, {
      patientId: filter.patientId ?? null,
      statusCode: 200,
      metadata: { ...metadata, resultCount: observations.length },
    });
    return observations;
  }

  /**
   * Total stored observations. An aggregate with no PHI, so not audited.
   */
  count(): Promise<number> {
    return this.store.count();
  }

  async getObservation(id: string, actor: Actor, requestContext?: RequestContext): Promise<Observation> {
    let observation: Observation | null;
    try {
      observation = await this.store.getById(id);
    } catch (error) {
      await this.recordRead(actor, requestContext, {
        resourceId: id,
        patientId: null,
        statusCode: isAppError(error) ? error.statusCode : 500,
        errorMessage: describeError(error),
      });
      throw error;
    }

    await this.recordRead(actor, requestContext, {
      resourceId: id,
      patientId: observation?.patientId ?? null,
      statusCode: observation ? 200 : 404,
      errorMessage: observation ? null : 'Observation not found',
    });

    if (!observation) {
      throw new NotFoundError('Observation', id);
    }
    return observation;
  }

  /**
   * Correct an observation's status (e.g. final → amended).
   * Values are immutable; only the status moves, along the allowed transitions.
   * The store write is a compare-and-set on the status read here, so of two
   * concurrent corrections from the same status only one succeeds.
   */
  async transitionStatus(
    id: string,
    status: ObservationStatus,
    actor: Actor,
    requestContext?: RequestContext
  ): Promise<Observation> {
    let current: Observation | null;
    try {
      current = await this.store.getById(id);
    } catch (error) {
      await this.recordUpdate(
        actor,
        requestContext,
        id,
        null,
        isAppError(error) ? error.statusCode : 500,
        describeError(error),
        { to: status }
      );
      throw error;
    }

    if (!current) {
      await this.recordUpdate(actor, requestContext, id, null, 404, 'Observation not found', { to: status });
      throw new NotFoundError('Observation', id);
    }

    const transition = { from: current.status, to: status };
    if (!canTransitionStatus(current.status, status)) {
      const error = invalidTransition(current.status, status);
      await this.recordUpdate(actor, requestContext, id, current.patientId, 400, error.message, transition);
      throw error;
    }

    let changed: boolean;
    try {
      changed = await this.store.updateStatus(id, current.status, status);
    } catch (error) {
      await this.recordUpdate(
        actor,
        requestContext,
        id,
        current.patientId,
        isAppError(error) ? error.statusCode : 500,
        describeError(error),
        transition
      );
      throw error;
    }

    if (!changed) {
      const error = new ValidationError(
        `Observation status changed concurrently; it is no longer ${current.status}`,
        'INVALID_TRANSITION',
        'status',
        status
      );
      await this.recordUpdate(actor, requestContext, id, current.patientId, 400, error.message, {
        ...transition,
        concurrent: true,
      });
      throw error;
    }

    await this.recordUpdate(actor, requestContext, id, current.patientId, 200, null, transition);
    logger.info('Observation status changed', { observationId: id, ...transition });
    return { ...current, status };
  }

  private async recordRead(
    actor: Actor,
    requestContext: RequestContext | undefined,
    params: {
      resourceId?: string;
      patientId: string | null;
      statusCode: number;
      errorMessage?: string | null;
      metadata?: Record<string, unknown>;
    }
  ): Promise<void> {
    await this.audit.record({
      actor,
      action: 'READ',
      resourceType: 'Observation',
      requestContext,
      ...params,
    });
  }

  private async recordUpdate(
    actor: Actor,
    requestContext: RequestContext | undefined,
    id: string,
    patientId: string | null,
    statusCode: number,
    errorMessage: string | null,
    metadata: Record<string, unknown>
  ): Promise<void> {
    await this.audit.record({
      actor,
      action: 'UPDATE',
      resourceType: 'Observation',
      resourceId: id,
      patientId,
      requestContext,
      statusCode,
      errorMessage,
      metadata,
    });
  }
}

function invalidTransition(from: ObservationStatus, to: ObservationStatus): ValidationError {
  return new ValidationError(`Cannot transition observation from ${from} to ${to}`, 'INVALID_TRANSITION', 'status', to);
}
