/**
 * AuditEntry entity - immutable audit log record
 * Records who did what to which resource, and how it ended
 */
export type AuditAction =
  | 'CREATE'
  | 'READ'
  | 'UPDATE'
  | 'DELETE'
  | 'LOGIN'
  | 'LOGOUT'
  | 'ACCESS_DENIED';

export type ActorRole = 'admin' | 'user' | 'device' | 'system';

export const ACTOR_ROLES: readonly ActorRole[] = ['admin', 'user', 'device', 'system'];

export interface Actor {
  actorId: string;
  actorRole: ActorRole;
}

export interface RequestContext {
  ip: string | null;
  userAgent: string | null;
  path: string | null;
}

export interface AuditEntry {
  id: string;
  timestamp: Date;
  actorId: string;
  actorRole: ActorRole;
  action: AuditAction;
  resourceType: string;
  resourceId: string | null;
  patientId: string | null;
  requestContext: RequestContext;
  statusCode: number | null;
  errorMessage: string | null;
  metadata: Record<string, unknown>;
}

export interface AuditFilter {
  patientId?: string;
  actorId?: string;
}

export const EMPTY_REQUEST_CONTEXT: RequestContext = { ip: null, userAgent: null, path: null };

export function isActorRole(value: unknown): value is ActorRole {
  return typeof value === 'string' && ACTOR_ROLES.some((role) => role === value);
}

/**
 * Factory function to create a new AuditEntry
 * All audit fields explicitly captured
 */
export function createAuditEntry(params: {
  id: string;
  actor: Actor;
  action: AuditAction;
  resourceType: string;
  resourceId?: string | null;
  patientId?: string | null;
  requestContext?: RequestContext;
  statusCode?: number | null;
  errorMessage?: string | null;
  metadata?: Record<string, unknown>;
  timestamp?: Date;
}): AuditEntry {
  return {
    id: params.id,
    timestamp: params.timestamp ?? new Date(),
    actorId: params.actor.actorId,
    actorRole: params.actor.actorRole,
    action: params.action,
    resourceType: params.resourceType,
    resourceId: params.resourceId ?? null,
    patientId: params.patientId ?? null,
    requestContext: params.requestContext ?? EMPTY_REQUEST_CONTEXT,
    statusCode: params.statusCode ?? null,
    errorMessage: params.errorMessage ?? null,
    metadata: params.metadata ?? {},
  };
}

/**
 * Actor used when an ingest call carries no resolved identity
 */
export function deviceActor(deviceId: string): Actor {
  const trimmed = deviceId.trim();
  return { actorId: `device:${trimmed.length > 0 ? trimmed : 'unknown'}`, actorRole: 'device' };
}

/**
 * Actor for work the service does on its own behalf (source runners, internal reads)
 */
export function systemActor(name: string): Actor {
  return { actorId: name, actorRole: 'system' };
}
