import type { Actor, AuditAction, RequestContext } from '../domain/entities/AuditEntry.js';
import { MlNotConfiguredError, describeError, isAppError } from '../domain/errors.js';
import type { MlAnalysis, MlClient, MlHealth, MlPredictionReport } from '../infra/ml/MlClient.js';
import { logger } from '../infra/logger.js';
import type { AuditService } from './AuditService.js';
import { clampLimit } from './AuditService.js';

export const PREDICT_DEFAULT_LIMIT = 100;
export const PREDICT_MAX_LIMIT = 1000;
export const ANALYSIS_DEFAULT_LIMIT = 1000;
export const ANALYSIS_MAX_LIMIT = 10000;
export const TRAIN_DEFAULT_MIN_SAMPLES = 100;

export interface MlQuery {
  limit?: number;
  hoursBack?: number;
}

export type MlServiceStatus =
  | { status: 'not_configured'; connected: false }
  | { status: 'error'; connected: false; error: string }
  | { status: string; connected: true; classifierLoaded: boolean; anomalyDetectorLoaded: boolean };

/**
 * MlService - audited access to the ML collaborator
 * Predictions and analyses are audited as reads of patient-derived data;
 * training is an audited update.
 */
export class MlService {
  constructor(
    private client: MlClient | null,
    private audit: AuditService
  ) {}

  predict(query: MlQuery, actor: Actor, requestContext?: RequestContext): Promise<MlPredictionReport> {
    const window = {
      limit: clampLimit(query.limit, PREDICT_DEFAULT_LIMIT, PREDICT_MAX_LIMIT),
      hoursBack: query.hoursBack,
    };
    return this.audited(
      { actor, requestContext, action: 'READ', resourceType: 'MlPrediction', metadata: window },
      (client) => client.predict(window)
    );
  }

  analyze(query: MlQuery, actor: Actor, requestContext?: RequestContext): Promise<MlAnalysis> {
    const window = {
      limit: clampLimit(query.limit, ANALYSIS_DEFAULT_LIMIT, ANALYSIS_MAX_LIMIT),
      hoursBack: query.hoursBack,
    };
    return this.audited(
      { actor, requestContext, action: 'READ', resourceType: 'MlAnalysis', metadata: window },
      (client) => client.analyze(window)
    );
  }

  async train(minSamples: number | undefined, actor: Actor, requestContext?: RequestContext): Promise<string> {
    const samples = minSamples ?? TRAIN_DEFAULT_MIN_SAMPLES;
    const message = await this.audited(
      { actor, requestContext, action: 'UPDATE', resourceType: 'MlModel', metadata: { minSamples: samples } },
      (client) => client.train(samples)
    );
    logger.info('ML training requested', { actorId: actor.actorId, minSamples: samples });
    return message;
  }

  health(): Promise<MlHealth> {
    return this.requireClient().health();
  }

  /**
   * Collaborator status for the liveness endpoint. Never throws.
   */
  async status(): Promise<MlServiceStatus> {
    if (!this.client) {
      return { status: 'not_configured', connected: false };
    }

    try {
      const health = await this.client.health();
      return {
        status: health.status,
        connected: true,
        classifierLoaded: health.classifierLoaded,
        anomalyDetectorLoaded: health.anomalyDetectorLoaded,
      };
    } catch (error) {
      logger.warn('ML service health check failed', { error: describeError(error) });
      return { status: 'error', connected: false, error: describeError(error) };
    }
  }

  private requireClient(): MlClient {
    if (!this.client) {
      throw new MlNotConfiguredError();
    }
    return this.client;
  }

  private async audited<T>(
    params: {
      actor: Actor;
      requestContext?: RequestContext;
      action: AuditAction;
      resourceType: string;
      metadata: Record<string, unknown>;
    },
    call: (client: MlClient) => Promise<T>
  ): Promise<T> {
    let result: T;
    try {
      result = await call(this.requireClient());
    } catch (error) {
      await this.audit.record({
        ...params,
        statusCode: isAppError(error) ? error.statusCode : 500,
        errorMessage: describeError(error),
      });
      logger.error('ML request failed', { resourceType: params.resourceType, error: describeError(error) });
      throw error;
    }

    await this.audit.record({ ...params, statusCode: 200 });
    return result;
  }
}
