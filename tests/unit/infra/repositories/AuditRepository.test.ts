import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseAdapter } from '../../../../src/infra/DatabaseAdapter.js';
import { AuditRepository } from '../../../../src/infra/repositories/AuditRepository.js';
import { InMemoryAuditRecorder } from '../../../../src/infra/repositories/InMemoryAuditRecorder.js';
import { createAuditEntry } from '../../../../src/domain/entities/AuditEntry.js';
import { AuditError } from '../../../../src/domain/errors.js';

function entry(id: string, overrides: { patientId?: string; actorId?: string; timestamp?: Date } = {}) {
  return createAuditEntry({
    id,
    actor: { actorId: overrides.actorId ?? 'nurse-7', actorRole: 'user' },
    action: 'READ',
    resourceType: 'Observation',
    patientId: overrides.patientId ?? 'p1',
    requestContext: { ip: '127.0.0.1', userAgent: 'vitest', path: '/api/observations' },
    statusCode: 200,
    metadata: { resultCount: 3 },
    timestamp: overrides.timestamp ?? new Date('2024-05-01T10:00:00.000Z'),
  });
}

describe('AuditRepository', () => {
  let db: DatabaseAdapter;
  let repo: AuditRepository;

  beforeEach(() => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    repo = new AuditRepository(db);
  });

  afterEach(() => {
    if (db.isOpen()) db.close();
  });

  it('round-trips every field', async () => {
    const original = entry('audit-1');
    await repo.record(original);

    expect(await repo.list({}, 10)).toEqual([original]);
  });

  it('lists newest first and keeps insert order for equal timestamps', async () => {
    await repo.record(entry('first'));
    await repo.record(entry('second'));
    await repo.record(entry('older', { timestamp: new Date('2024-04-30T10:00:00.000Z') }));

    expect((await repo.list({}, 10)).map((e) => e.id)).toEqual(['second', 'first', 'older']);
  });

  it('filters by patient and actor', async () => {
    await repo.record(entry('a', { patientId: 'p1', actorId: 'nurse-7' }));
    await repo.record(entry('b', { patientId: 'p2', actorId: 'nurse-7' }));
    await repo.record(entry('c', { patientId: 'p1', actorId: 'dr-3' }));

    expect((await repo.list({ patientId: 'p1' }, 10)).map((e) => e.id)).toEqual(['c', 'a']);
    expect((await repo.list({ patientId: 'p1', actorId: 'nurse-7' }, 10)).map((e) => e.id)).toEqual(['a']);
    expect((await repo.list({}, 2)).map((e) => e.id)).toEqual(['c', 'b']);
  });

  it('wraps write failures in AuditError', async () => {
    await repo.record(entry('dup'));

    const failure = repo.record(entry('dup'));
    await expect(failure).rejects.toBeInstanceOf(AuditError);
    await expect(failure).rejects.toThrow('Failed to record audit entry dup');
  });

  it('refuses updates and deletes at the storage level', async () => {
    await repo.record(entry('audit-1'));

    expect(() => db.execute("UPDATE audit_logs SET actor_id = 'x'")).toThrow(/append-only/);
    expect(() => db.execute('DELETE FROM audit_logs')).toThrow(/append-only/);
    expect(await repo.list({}, 10)).toHaveLength(1);
  });
});

describe('InMemoryAuditRecorder', () => {
  it('lists newest first with filters and limit', async () => {
    const recorder = new InMemoryAuditRecorder();
    await recorder.record(entry('a', { patientId: 'p1' }));
    await recorder.record(entry('b', { patientId: 'p2' }));
    await recorder.record(entry('c', { patientId: 'p1' }));

    expect((await recorder.list({}, 10)).map((e) => e.id)).toEqual(['c', 'b', 'a']);
    expect((await recorder.list({ patientId: 'p1' }, 1)).map((e) => e.id)).toEqual(['c']);
  });
});
