import { randomUUID } from 'node:crypto';
import { createAuditEntry } from '../domain/entities/AuditEntry.js';
import type {
  Actor,
  AuditAction,
  AuditEntry,
  AuditFilter,
  RequestContext,
} from '../domain/entities/AuditEntry.js';
import { describeError, isAppError } from '../domain/errors.js';
import type { AuditRecorder } from '../infra/repositories/AuditRecorder.js';
import { logger } from '../infra/logger.js';

export const AUDIT_LOG_DEFAULT_LIMIT = 100;
export const AUDIT_LOG_MAX_LIMIT = 500;

export interface AuditEventParams {
  actor: Actor;
  action: AuditAction;
  resourceType: string;
  resourceId?: string | null;
  patientId?: string | null;
  requestContext?: RequestContext;
  statusCode?: number | null;
  errorMessage?: string | null;
  metadata?: Record<string, unknown>;
}

/**
 * AuditService - builds audit entries and hands them to the recorder
 *
 * Every attempt is made synchronously with the operation being audited.
 * A failed write degrades the operation to "succeeded but unaudited":
 * it is logged for operators and reported to the caller as `false`.
 */
export class AuditService {
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(
    private recorder: AuditRecorder,
    options: { generateId?: () => string; now?: () => Date } = {}
  ) {
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  async record(params: AuditEventParams): Promise<boolean> {
    const entry = createAuditEntry({ ...params, id: this.generateId(), timestamp: this.now() });

    try {
      await this.recorder.record(entry);
      return true;
    } catch (error) {
      logger.error('Audit write failed; operation continues unaudited', {
        auditId: entry.id,
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        actorId: entry.actorId,
        error: describeError(error),
      });
      return false;
    }
  }

  /**
   * Read the audit trail. The read itself is audited.
   */
  async auditLog(
    filter: AuditFilter,
    limit: number | undefined,
    actor: Actor,
    requestContext?: RequestContext
  ): Promise<AuditEntry[]> {
    const effectiveLimit = clampLimit(limit);

    try {
      const entries = await this.recorder.list(filter, effectiveLimit);
      await this.record({
        actor,
        action: 'READ',
        resourceType: 'AuditLog',
        patientId: filter.patientId ?? null,
        requestContext,
        statusCode: 200,
        metadata: { filter, limit: effectiveLimit, resultCount: entries.length },
      });
      return entries;
    } catch (error) {
      await this.record({
        actor,
        action: 'READ',
        resourceType: 'AuditLog',
        patientId: filter.patientId ?? null,
        requestContext,
        statusCode: isAppError(error) ? error.statusCode : 500,
        errorMessage: describeError(error),
        metadata: { filter, limit: effectiveLimit },
      });
      throw error;
    }
  }
}

export function clampLimit(
  limit: number | undefined,
  fallback = AUDIT_LOG_DEFAULT_LIMIT,
  max = AUDIT_LOG_MAX_LIMIT
): number {
  if (limit === undefined || !Number.isFinite(limit)) return fallback;
  return Math.min(Math.max(Math.trunc(limit), 1), max);
}
