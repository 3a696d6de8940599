import { describe, expect, it, vi } from 'vitest';
import { HttpMlClient } from '../../../../src/infra/ml/HttpMlClient.js';
import { MlServiceError } from '../../../../src/domain/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function clientReturning(response: Response | Error) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    if (response instanceof Error) throw response;
    return response;
  });
  const client = new HttpMlClient('http://ml.test/', { timeoutMs: 1000, fetch: fetchMock });
  return { client, fetchMock };
}

describe('HttpMlClient', () => {
  it('posts the prediction window and maps the snake_case answer', async () => {
    const { client, fetchMock } = clientReturning(
      jsonResponse({
        success: true,
        total_readings: 1,
        predictions: [
          { value: 245, timestamp: '2024-05-01T09:59:00Z', category_rule: 'moderate', anomaly_score: 0.4 },
        ],
        summary: { total_readings: 1, avg_value: 245, max_value: 245, min_value: 245, anomaly_count: 0 },
      })
    );

    const report = await client.predict({ limit: 50, hoursBack: 6 });

    expect(report).toEqual({
      totalReadings: 1,
      predictions: [
        {
          value: 245,
          timestamp: '2024-05-01T09:59:00Z',
          categoryRule: 'moderate',
          categoryMl: null,
          categoryConfidence: null,
          isAnomaly: false,
          anomalyScore: 0.4,
        },
      ],
      summary: { totalReadings: 1, avgValue: 245, maxValue: 245, minValue: 245, anomalyCount: 0 },
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ml.test/predict');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"limit":50,"hours_back":6}');
  });

  it('puts the analysis window in the query string', async () => {
    const { client, fetchMock } = clientReturning(
      jsonResponse({
        success: true,
        analysis: { total_readings: 3, avg_level: 200, std_level: 5, min_level: 190, max_level: 210 },
      })
    );

    const analysis = await client.analyze({ limit: 1000 });

    expect(fetchMock.mock.calls[0][0]).toBe('http://ml.test/analysis?limit=1000');
    expect(analysis).toEqual({
      totalReadings: 3,
      avgLevel: 200,
      stdLevel: 5,
      minLevel: 190,
      maxLevel: 210,
      anomalyCount: 0,
      anomalyPercentage: 0,
      peakHour: 0,
      quietestHour: 0,
    });
  });

  it('falls back to a default training acknowledgement', async () => {
    const { client, fetchMock } = clientReturning(jsonResponse({ success: true }));

    expect(await client.train(100)).toBe('Training started');
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"min_samples":100}');
  });

  it('maps the health answer', async () => {
    const { client } = clientReturning(
      jsonResponse({
        status: 'healthy',
        database_connected: true,
        classifier_loaded: false,
        anomaly_detector_loaded: true,
      })
    );

    expect(await client.health()).toEqual({
      status: 'healthy',
      databaseConnected: true,
      classifierLoaded: false,
      anomalyDetectorLoaded: true,
    });
  });

  it('reports a non-2xx answer as MlServiceError', async () => {
    const { client } = clientReturning(jsonResponse({ detail: 'boom' }, 500));

    const attempt = client.health();
    await expect(attempt).rejects.toBeInstanceOf(MlServiceError);
    await expect(attempt).rejects.toThrow('ML service returned status 500');
  });

  it('reports an unreachable service as MlServiceError', async () => {
    const { client } = clientReturning(new TypeError('fetch failed'));

    await expect(client.health()).rejects.toThrow('ML service request failed: fetch failed');
  });

  it('rejects an answer with the wrong shape', async () => {
    const { client } = clientReturning(jsonResponse({ status: 'healthy' }));

    await expect(client.health()).rejects.toThrow('Unexpected ML response shape');
  });
});
