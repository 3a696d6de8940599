import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  ActorRole,
  AuditAction,
  AuditEntry,
  AuditFilter,
} from '../../domain/entities/AuditEntry.js';
import { AuditError } from '../../domain/errors.js';
import type { AuditRecorder } from './AuditRecorder.js';
import { logger } from '../logger.js';

type AuditRow = {
  seq: number;
  id: string;
  timestamp: string;
  actor_id: string;
  actor_role: ActorRole;
  action: AuditAction;
  resource_type: string;
  resource_id: string | null;
  patient_id: string | null;
  ip_address: string | null;
  user_agent: string | null;
  request_path: string | null;
  status_code: number | null;
  error_message: string | null;
  metadata: string;
};

/**
 * Repository for AuditEntry persistence
 * Audit operations isolated from business logic
 */
export class AuditRepository implements AuditRecorder {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Append an audit entry.
   * Unlike the data path, failures surface as AuditError so the caller can
   * report them; the caller decides whether the parent operation survives.
   */
  async record(entry: AuditEntry): Promise<void> {
    const sql = `
      INSERT INTO audit_logs (
        id, timestamp, actor_id, actor_role, action, resource_type, resource_id, patient_id,
        ip_address, user_agent, request_path, status_code, error_message, metadata
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    try {
      this.db.execute(sql, [
        entry.id,
        entry.timestamp.toISOString(),
        entry.actorId,
        entry.actorRole,
        entry.action,
        entry.resourceType,
        entry.resourceId,
        entry.patientId,
        entry.requestContext.ip,
        entry.requestContext.userAgent,
        entry.requestContext.path,
        entry.statusCode,
        entry.errorMessage,
        JSON.stringify(entry.metadata),
      ]);
    } catch (error) {
      throw new AuditError(`Failed to record audit entry ${entry.id}`, { cause: error });
    }

    logger.debug('Audit event logged', {
      auditId: entry.id,
      action: entry.action,
      resourceType: entry.resourceType,
      actorId: entry.actorId,
    });
  }

  /**
   * Get audit events, optionally narrowed to a patient and/or actor
   */
  async list(filter: AuditFilter, limit: number): Promise<AuditEntry[]> {
    const conditions: string[] = [];
    const values: (string | number)[] = [];

    if (filter.patientId) {
      conditions.push('patient_id = ?');
      values.push(filter.patientId);
    }

    if (filter.actorId) {
      conditions.push('actor_id = ?');
      values.push(filter.actorId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `
      SELECT * FROM audit_logs
      ${where}
      ORDER BY timestamp DESC, seq DESC
      LIMIT ?
    `;

    const rows = this.db.query<AuditRow>(sql, [...values, limit]);
    return rows.map((row) => this.mapRowToAuditEntry(row));
  }

  /**
   * Map database row to AuditEntry entity
   */
  private mapRowToAuditEntry(row: AuditRow): AuditEntry {
    return {
      id: row.id,
      timestamp: new Date(row.timestamp),
      actorId: row.actor_id,
      actorRole: row.actor_role,
      action: row.action,
      resourceType: row.resource_type,
      resourceId: row.resource_id,
      patientId: row.patient_id,
      requestContext: {
        ip: row.ip_address,
        userAgent: row.user_agent,
        path: row.request_path,
      },
      statusCode: row.status_code,
      errorMessage: row.error_message,
      metadata: parseMetadata(row.metadata),
    };
  }
}

function parseMetadata(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return {};
}
