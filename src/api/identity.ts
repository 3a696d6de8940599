import type { IncomingHttpHeaders } from 'node:http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { isActorRole, systemActor } from '../domain/entities/AuditEntry.js';
import type { Actor, ActorRole, RequestContext } from '../domain/entities/AuditEntry.js';
import { AccessDeniedError } from '../domain/errors.js';
import type { AuditService } from '../services/AuditService.js';

const ACTOR_ID_HEADER = 'x-actor-id';
const ACTOR_ROLE_HEADER = 'x-actor-role';

/**
 * Read the identity attached by the upstream authentication gateway.
 * Token verification happens there; a missing or malformed identity is `null`.
 */
export function resolveActorFromHeaders(headers: IncomingHttpHeaders): Actor | null {
  const actorId = headers[ACTOR_ID_HEADER];
  const actorRole = headers[ACTOR_ROLE_HEADER];

  if (typeof actorId !== 'string' || actorId.trim().length === 0) return null;
  if (typeof actorRole !== 'string') return null;

  const role = actorRole.trim().toLowerCase();
  if (!isActorRole(role)) return null;

  return { actorId: actorId.trim(), actorRole: role };
}

/**
 * Attach the resolved actor (or null) to res.locals for downstream handlers
 */
export function resolveIdentity(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    res.locals.actor = resolveActorFromHeaders(req.headers);
    next();
  };
}

export function getActor(res: Response): Actor | null {
  const actor: unknown = res.locals.actor;
  if (
    actor !== null &&
    typeof actor === 'object' &&
    'actorId' in actor &&
    'actorRole' in actor &&
    typeof actor.actorId === 'string' &&
    isActorRole(actor.actorRole)
  ) {
    return { actorId: actor.actorId, actorRole: actor.actorRole };
  }
  return null;
}

/**
 * Actor for read paths: unresolved identity is treated as the system
 */
export function readerActor(res: Response): Actor {
  return getActor(res) ?? systemActor('anonymous');
}

export function requestContextOf(req: Request): RequestContext {
  return {
    ip: req.ip ?? null,
    userAgent: req.get('user-agent') ?? null,
    path: req.originalUrl || req.path,
  };
}

/**
 * Authorization decision point. Every denial is audited as ACCESS_DENIED.
 */
export function requireRole(
  audit: AuditService,
  resourceType: string,
  ...roles: ActorRole[]
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const actor = readerActor(res);
    if (roles.includes(actor.actorRole)) {
      next();
      return;
    }

    const error = new AccessDeniedError(`Role ${actor.actorRole} may not access ${resourceType}`, {
      requiredRoles: roles,
    });
    await audit.record({
      actor,
      action: 'ACCESS_DENIED',
      resourceType,
      requestContext: requestContextOf(req),
      statusCode: error.statusCode,
      errorMessage: error.message,
      metadata: { method: req.method, requiredRoles: roles },
    });
    next(error);
  };
}
