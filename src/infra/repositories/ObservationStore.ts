import type { Observation, ObservationStatus } from '../../domain/entities/Observation.js';

export interface ObservationFilter {
  patientId?: string;
  deviceId?: string;
  since?: Date;
  limit: number;
}

/**
 * Capability set the pipeline needs from durable observation storage.
 * One implementation per backend; callers depend only on this interface.
 *
 * Failures are reported as StoreConstraintError (client-correctable)
 * or StoreUnavailableError (retryable by the caller).
 */
export interface ObservationStore {
  /** Enforces unique `id` and the Observation invariants. */
  insert(observation: Observation): Promise<void>;
  /** Most recent `effectiveTime` first. */
  list(filter: ObservationFilter): Promise<Observation[]>;
  count(): Promise<number>;
  getById(id: string): Promise<Observation | null>;
  /**
   * Compare-and-set: moves `id` from `from` to `to` only while it is still `from`.
   * Resolves false when no row matched (unknown id or a concurrent change).
   */
  updateStatus(id: string, from: ObservationStatus, to: ObservationStatus): Promise<boolean>;
  healthCheck(): Promise<boolean>;
}
