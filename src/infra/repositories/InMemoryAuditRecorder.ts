import type { AuditEntry, AuditFilter } from '../../domain/entities/AuditEntry.js';
import type { AuditRecorder } from './AuditRecorder.js';

/**
 * Process-local audit sink for STORAGE_BACKEND=memory.
 */
export class InMemoryAuditRecorder implements AuditRecorder {
  private entries: AuditEntry[] = [];

  async record(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async list(filter: AuditFilter, limit: number): Promise<AuditEntry[]> {
    const matches: AuditEntry[] = [];
    for (let i = this.entries.length - 1; i >= 0 && matches.length < limit; i -= 1) {
      const entry = this.entries[i];
      if (filter.patientId && entry.patientId !== filter.patientId) continue;
      if (filter.actorId && entry.actorId !== filter.actorId) continue;
      matches.push(entry);
    }
    return matches;
  }
}
