import { beforeEach, describe, expect, it } from 'vitest';
import { MlService } from '../../../src/services/MlService.js';
import { AuditService } from '../../../src/services/AuditService.js';
import { InMemoryAuditRecorder } from '../../../src/infra/repositories/InMemoryAuditRecorder.js';
import { MlNotConfiguredError, MlServiceError } from '../../../src/domain/errors.js';
import { FakeMlClient } from '../fixtures.js';

const clinician = { actorId: 'nurse-7', actorRole: 'user' as const };
const admin = { actorId: 'admin-1', actorRole: 'admin' as const };

describe('MlService', () => {
  let recorder: InMemoryAuditRecorder;
  let client: FakeMlClient;
  let service: MlService;

  beforeEach(() => {
    recorder = new InMemoryAuditRecorder();
    client = new FakeMlClient();
    service = new MlService(client, new AuditService(recorder));
  });

  it('clamps the prediction window and audits the read', async () => {
    const report = await service.predict({ limit: 5000, hoursBack: 6 }, clinician);

    expect(report.totalReadings).toBe(1);
    expect(client.windows).toEqual([{ limit: 1000, hoursBack: 6 }]);
    const [entry] = await recorder.list({}, 1);
    expect(entry).toMatchObject({
      actorId: 'nurse-7',
      action: 'READ',
      resourceType: 'MlPrediction',
      statusCode: 200,
      metadata: { limit: 1000, hoursBack: 6 },
    });
  });

  it('defaults the analysis window', async () => {
    await service.analyze({}, clinician);

    expect(client.windows).toEqual([{ limit: 1000, hoursBack: undefined }]);
    const [entry] = await recorder.list({}, 1);
    expect(entry).toMatchObject({ action: 'READ', resourceType: 'MlAnalysis', statusCode: 200 });
  });

  it('audits training as an update with the default sample floor', async () => {
    expect(await service.train(undefined, admin)).toBe('Training started');

    expect(client.trainedWith).toEqual([100]);
    const [entry] = await recorder.list({}, 1);
    expect(entry).toMatchObject({
      actorId: 'admin-1',
      action: 'UPDATE',
      resourceType: 'MlModel',
      statusCode: 200,
      metadata: { minSamples: 100 },
    });
  });

  it('audits a failed call with the error status', async () => {
    client.failure = new MlServiceError('ML service returned status 500');

    await expect(service.predict({}, clinician)).rejects.toBeInstanceOf(MlServiceError);

    const [entry] = await recorder.list({}, 1);
    expect(entry).toMatchObject({
      resourceType: 'MlPrediction',
      statusCode: 502,
      errorMessage: 'ML service returned status 500',
    });
  });

  it('refuses and audits calls when no collaborator is configured', async () => {
    const unconfigured = new MlService(null, new AuditService(recorder));

    await expect(unconfigured.train(10, admin)).rejects.toBeInstanceOf(MlNotConfiguredError);
    await expect(unconfigured.health()).rejects.toBeInstanceOf(MlNotConfiguredError);

    const [entry] = await recorder.list({}, 1);
    expect(entry).toMatchObject({
      action: 'UPDATE',
      resourceType: 'MlModel',
      statusCode: 503,
      errorMessage: 'ML service not configured',
    });
  });

  describe('status', () => {
    it('reports a missing collaborator', async () => {
      const unconfigured = new MlService(null, new AuditService(recorder));

      expect(await unconfigured.status()).toEqual({ status: 'not_configured', connected: false });
    });

    it('reports a healthy collaborator', async () => {
      expect(await service.status()).toEqual({
        status: 'healthy',
        connected: true,
        classifierLoaded: true,
        anomalyDetectorLoaded: false,
      });
    });

    it('reports a failing collaborator without throwing', async () => {
      client.failure = new MlServiceError('ML service request failed: fetch failed');

      expect(await service.status()).toEqual({
        status: 'error',
        connected: false,
        error: 'ML service request failed: fetch failed',
      });
    });
  });
});
