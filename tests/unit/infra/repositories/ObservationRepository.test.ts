import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseAdapter } from '../../../../src/infra/DatabaseAdapter.js';
import { ObservationRepository } from '../../../../src/infra/repositories/ObservationRepository.js';
import {
  StoreConstraintError,
  StoreUnavailableError,
} from '../../../../src/domain/errors.js';
import { observationOf } from '../../fixtures.js';

describe('ObservationRepository', () => {
  let db: DatabaseAdapter;
  let repo: ObservationRepository;

  beforeEach(() => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    repo = new ObservationRepository(db);
  });

  afterEach(() => {
    if (db.isOpen()) db.close();
  });

  it('round-trips an observation', async () => {
    const observation = observationOf();
    await repo.insert(observation);

    expect(await repo.getById('obs-1')).toEqual(observation);
    expect(await repo.count()).toBe(1);
  });

  it('returns null for an unknown id', async () => {
    expect(await repo.getById('missing')).toBeNull();
  });

  it('rejects a duplicate id as a constraint violation', async () => {
    await repo.insert(observationOf());

    await expect(repo.insert(observationOf({ value: 12 }))).rejects.toBeInstanceOf(StoreConstraintError);
    expect(await repo.count()).toBe(1);
  });

  it('enforces the sound range in the schema', async () => {
    await expect(repo.insert(observationOf({ id: 'obs-2', value: 1500 }))).rejects.toBeInstanceOf(
      StoreConstraintError
    );
    await expect(repo.insert(observationOf({ id: 'obs-3', unit: ' ' }))).rejects.toBeInstanceOf(
      StoreConstraintError
    );
    expect(await repo.count()).toBe(0);
  });

  it('lists newest effective time first, then newest insert', async () => {
    await repo.insert(observationOf({ id: 'a', effectiveTime: new Date('2024-05-01T10:00:00.000Z') }));
    await repo.insert(observationOf({ id: 'b', effectiveTime: new Date('2024-05-01T10:05:00.000Z') }));
    await repo.insert(observationOf({ id: 'c', effectiveTime: new Date('2024-05-01T10:00:00.000Z') }));

    const observations = await repo.list({ limit: 10 });
    expect(observations.map((o) => o.id)).toEqual(['b', 'c', 'a']);
  });

  it('filters by patient, device and since, and honours the limit', async () => {
    await repo.insert(observationOf({ id: 'a', patientId: 'p1', deviceId: 'dev-1' }));
    await repo.insert(observationOf({ id: 'b', patientId: 'p2', deviceId: 'dev-1' }));
    await repo.insert(
      observationOf({
        id: 'c',
        patientId: 'p1',
        deviceId: 'dev-2',
        effectiveTime: new Date('2024-05-02T00:00:00.000Z'),
      })
    );

    expect((await repo.list({ patientId: 'p1', limit: 10 })).map((o) => o.id)).toEqual(['c', 'a']);
    expect((await repo.list({ deviceId: 'dev-1', limit: 10 })).map((o) => o.id)).toEqual(['b', 'a']);
    expect(
      (await repo.list({ since: new Date('2024-05-01T12:00:00.000Z'), limit: 10 })).map((o) => o.id)
    ).toEqual(['c']);
    expect((await repo.list({ limit: 1 })).map((o) => o.id)).toEqual(['c']);
  });

  it('updates status only while it still has the expected status', async () => {
    await repo.insert(observationOf());

    expect(await repo.updateStatus('obs-1', 'final', 'amended')).toBe(true);
    expect(await repo.getById('obs-1')).toEqual(observationOf({ status: 'amended' }));
    expect(await repo.updateStatus('obs-1', 'final', 'amended')).toBe(false);
  });

  it('reports no change when updating an unknown observation', async () => {
    expect(await repo.updateStatus('missing', 'final', 'amended')).toBe(false);
  });

  it('orders effective times past year 9999 as newest', async () => {
    await repo.insert(observationOf({ id: 'far', effectiveTime: new Date('+010000-01-01T00:00:00.000Z') }));
    await repo.insert(observationOf({ id: 'now', effectiveTime: new Date('2024-05-01T10:00:00.000Z') }));

    expect((await repo.list({ limit: 10 })).map((o) => o.id)).toEqual(['far', 'now']);
    expect((await repo.getById('far'))?.effectiveTime.getUTCFullYear()).toBe(10000);
  });

  it('reports an unavailable store once the database is closed', async () => {
    expect(await repo.healthCheck()).toBe(true);
    db.close();

    await expect(repo.healthCheck()).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(repo.insert(observationOf())).rejects.toMatchObject({
      code: 'STORE_UNAVAILABLE',
      retryable: true,
    });
  });
});
