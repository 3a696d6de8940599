import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Observation, ObservationCode, ObservationStatus } from '../../domain/entities/Observation.js';
import {
  DatabaseError,
  StoreConstraintError,
  StoreUnavailableError,
} from '../../domain/errors.js';
import type { StoreError } from '../../domain/errors.js';
import type { ObservationFilter, ObservationStore } from './ObservationStore.js';
import { logger } from '../logger.js';

type ObservationRow = {
  seq: number;
  id: string;
  patient_id: string;
  device_id: string;
  code: ObservationCode;
  value: number;
  unit: string;
  /** epoch milliseconds */
  effective_time: number;
  status: ObservationStatus;
  /** epoch milliseconds */
  recorded_at: number;
};

/**
 * SQLite-backed ObservationStore
 * SQL stays here, callers see StoreError only
 */
export class ObservationRepository implements ObservationStore {
  constructor(private db: DatabaseAdapter) {}

  async insert(observation: Observation): Promise<void> {
    const sql = `
      INSERT INTO observations (
        id, patient_id, device_id, code, value, unit, effective_time, status, recorded_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.run(() =>
      this.db.execute(sql, [
        observation.id,
        observation.patientId,
        observation.deviceId,
        observation.code,
        observation.value,
        observation.unit,
        observation.effectiveTime.getTime(),
        observation.status,
        observation.recordedAt.getTime(),
      ])
    );

    logger.debug('Observation stored', {
      observationId: observation.id,
      patientId: observation.patientId,
      deviceId: observation.deviceId,
    });
  }

  async list(filter: ObservationFilter): Promise<Observation[]> {
    const conditions: string[] = [];
    const values: (string | number)[] = [];

    if (filter.patientId) {
      conditions.push('patient_id = ?');
      values.push(filter.patientId);
    }

    if (filter.deviceId) {
      conditions.push('device_id = ?');
      values.push(filter.deviceId);
    }

    if (filter.since) {
      conditions.push('effective_time >= ?');
      values.push(filter.since.getTime());
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `
      SELECT * FROM observations
      ${where}
      ORDER BY effective_time DESC, seq DESC
      LIMIT ?
    `;

    const rows = this.run(() => this.db.query<ObservationRow>(sql, [...values, filter.limit]));
    return rows.map((row) => this.mapRowToObservation(row));
  }

  async count(): Promise<number> {
    const row = this.run(() =>
      this.db.queryOne<{ total: number }>('SELECT COUNT(*) AS total FROM observations')
    );
    return row?.total ?? 0;
  }

  async getById(id: string): Promise<Observation | null> {
    const row = this.run(() =>
      this.db.queryOne<ObservationRow>('SELECT * FROM observations WHERE id = ?', [id])
    );
    return row ? this.mapRowToObservation(row) : null;
  }

  async updateStatus(id: string, from: ObservationStatus, to: ObservationStatus): Promise<boolean> {
    const changes = this.run(() =>
      this.db.execute('UPDATE observations SET status = ? WHERE id = ? AND status = ?', [to, id, from])
    );
    return changes > 0;
  }

  async healthCheck(): Promise<boolean> {
    this.run(() => this.db.queryOne<{ ok: number }>('SELECT 1 AS ok'));
    return true;
  }

  private run<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw toStoreError(error);
    }
  }

  private mapRowToObservation(row: ObservationRow): Observation {
    return {
      id: row.id,
      patientId: row.patient_id,
      deviceId: row.device_id,
      code: row.code,
      value: row.value,
      unit: row.unit,
      effectiveTime: new Date(row.effective_time),
      status: row.status,
      recordedAt: new Date(row.recorded_at),
    };
  }
}

function toStoreError(error: unknown): StoreError {
  if (error instanceof DatabaseError && error.isConstraintViolation()) {
    return new StoreConstraintError(error.message, { sqliteCode: error.sqliteCode });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StoreUnavailableError(`Observation store unavailable: ${message}`);
}
