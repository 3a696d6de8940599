import type { Observation, ObservationStatus } from '../../domain/entities/Observation.js';
import { assertObservationInvariants } from '../../domain/entities/Observation.js';
import { StoreConstraintError } from '../../domain/errors.js';
import type { ObservationFilter, ObservationStore } from './ObservationStore.js';

/**
 * Process-local ObservationStore for STORAGE_BACKEND=memory (demo mode, tests).
 * Enforces the same uniqueness and invariants as the SQLite schema.
 */
export class InMemoryObservationStore implements ObservationStore {
  private rows: { seq: number; observation: Observation }[] = [];
  private ids = new Set<string>();
  private seq = 0;

  async insert(observation: Observation): Promise<void> {
    if (this.ids.has(observation.id)) {
      throw new StoreConstraintError(`Observation ${observation.id} already exists`, {
        constraint: 'unique_id',
      });
    }

    assertObservationInvariants(observation);

    this.seq += 1;
    this.ids.add(observation.id);
    this.rows.push({ seq: this.seq, observation: { ...observation } });
  }

  async list(filter: ObservationFilter): Promise<Observation[]> {
    return this.rows
      .filter(({ observation }) => {
        if (filter.patientId && observation.patientId !== filter.patientId) return false;
        if (filter.deviceId && observation.deviceId !== filter.deviceId) return false;
        if (filter.since && observation.effectiveTime.getTime() < filter.since.getTime()) return false;
        return true;
      })
      .sort(
        (a, b) =>
          b.observation.effectiveTime.getTime() - a.observation.effectiveTime.getTime() ||
          b.seq - a.seq
      )
      .slice(0, filter.limit)
      .map(({ observation }) => ({ ...observation }));
  }

  async count(): Promise<number> {
    return this.rows.length;
  }

  async getById(id: string): Promise<Observation | null> {
    const row = this.rows.find(({ observation }) => observation.id === id);
    return row ? { ...row.observation } : null;
  }

  async updateStatus(id: string, from: ObservationStatus, to: ObservationStatus): Promise<boolean> {
    const row = this.rows.find(({ observation }) => observation.id === id);
    if (!row || row.observation.status !== from) {
      return false;
    }
    row.observation = { ...row.observation, status: to };
    return true;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
