import type { AuditEntry, AuditFilter } from '../../domain/entities/AuditEntry.js';

/**
 * Append-only audit sink.
 * `record` rejects with AuditError when the entry could not be made durable.
 */
export interface AuditRecorder {
  record(entry: AuditEntry): Promise<void>;
  /** Newest first. */
  list(filter: AuditFilter, limit: number): Promise<AuditEntry[]>;
}
