import { z } from 'zod';
import { MlServiceError, describeError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { MlAnalysis, MlClient, MlHealth, MlPredictionReport, MlWindow } from './MlClient.js';

const predictionSchema = z.object({
  value: z.number(),
  timestamp: z.string(),
  category_rule: z.string(),
  category_ml: z.string().nullable().optional(),
  category_confidence: z.number().nullable().optional(),
  is_anomaly: z.boolean().default(false),
  anomaly_score: z.number().default(0),
});

const predictionResponseSchema = z.object({
  total_readings: z.number().int(),
  predictions: z.array(predictionSchema),
  summary: z.object({
    total_readings: z.number().int(),
    avg_value: z.number(),
    max_value: z.number(),
    min_value: z.number(),
    anomaly_count: z.number().int(),
  }),
});

const analysisResponseSchema = z.object({
  analysis: z.object({
    total_readings: z.number().int(),
    avg_level: z.number(),
    std_level: z.number(),
    min_level: z.number(),
    max_level: z.number(),
    anomaly_count: z.number().int().default(0),
    anomaly_percentage: z.number().default(0),
    peak_hour: z.number().int().default(0),
    quietest_hour: z.number().int().default(0),
  }),
});

const trainResponseSchema = z.object({
  message: z.string().optional(),
});

const healthResponseSchema = z.object({
  status: z.string(),
  database_connected: z.boolean(),
  classifier_loaded: z.boolean(),
  anomaly_detector_loaded: z.boolean(),
});

export interface HttpMlClientOptions {
  timeoutMs: number;
  fetch?: typeof fetch;
}

/**
 * MlClient over the collaborator's JSON HTTP API (snake_case on the wire)
 */
export class HttpMlClient implements MlClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(
    baseUrl: string,
    private options: HttpMlClientOptions
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async predict(window: MlWindow): Promise<MlPredictionReport> {
    const body = await this.request('/predict', predictionResponseSchema, {
      method: 'POST',
      body: {
        limit: window.limit,
        ...(window.hoursBack !== undefined ? { hours_back: window.hoursBack } : {}),
      },
    });

    return {
      totalReadings: body.total_readings,
      predictions: body.predictions.map((prediction) => ({
        value: prediction.value,
        timestamp: prediction.timestamp,
        categoryRule: prediction.category_rule,
        categoryMl: prediction.category_ml ?? null,
        categoryConfidence: prediction.category_confidence ?? null,
        isAnomaly: prediction.is_anomaly,
        anomalyScore: prediction.anomaly_score,
      })),
      summary: {
        totalReadings: body.summary.total_readings,
        avgValue: body.summary.avg_value,
        maxValue: body.summary.max_value,
        minValue: body.summary.min_value,
        anomalyCount: body.summary.anomaly_count,
      },
    };
  }

  async analyze(window: MlWindow): Promise<MlAnalysis> {
    const params = new URLSearchParams({ limit: String(window.limit) });
    if (window.hoursBack !== undefined) {
      params.set('hours_back', String(window.hoursBack));
    }

    const { analysis } = await this.request(`/analysis?${params.toString()}`, analysisResponseSchema);
    return {
      totalReadings: analysis.total_readings,
      avgLevel: analysis.avg_level,
      stdLevel: analysis.std_level,
      minLevel: analysis.min_level,
      maxLevel: analysis.max_level,
      anomalyCount: analysis.anomaly_count,
      anomalyPercentage: analysis.anomaly_percentage,
      peakHour: analysis.peak_hour,
      quietestHour: analysis.quietest_hour,
    };
  }

  async train(minSamples: number): Promise<string> {
    const body = await this.request('/train', trainResponseSchema, {
      method: 'POST',
      body: { min_samples: minSamples },
    });
    return body.message ?? 'Training started';
  }

  async health(): Promise<MlHealth> {
    const body = await this.request('/health', healthResponseSchema);
    return {
      status: body.status,
      databaseConnected: body.database_connected,
      classifierLoaded: body.classifier_loaded,
      anomalyDetectorLoaded: body.anomaly_detector_loaded,
    };
  }

  private async request<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    init: { method?: 'GET' | 'POST'; body?: unknown } = {}
  ): Promise<z.infer<T>> {
    const url = `${this.baseUrl}${path}`;
    const hasBody = init.body !== undefined;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: init.method ?? 'GET',
        headers: hasBody ? { 'Content-Type': 'application/json' } : undefined,
        body: hasBody ? JSON.stringify(init.body) : undefined,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new MlServiceError(`ML service request failed: ${describeError(error)}`, { path });
    }

    if (!response.ok) {
      throw new MlServiceError(`ML service returned status ${response.status}`, {
        path,
        status: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new MlServiceError(`Failed to parse ML response: ${describeError(error)}`, { path });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      logger.warn('ML response did not match the expected shape', { path, issues: parsed.error.issues });
      throw new MlServiceError('Unexpected ML response shape', { path });
    }
    return parsed.data;
  }
}
