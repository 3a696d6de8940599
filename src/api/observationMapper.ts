import { OBSERVATION_CODES } from '../domain/entities/Observation.js';
import type { Observation, ObservationStatus } from '../domain/entities/Observation.js';
import type { AuditEntry } from '../domain/entities/AuditEntry.js';

export interface FhirObservation {
  resourceType: 'Observation';
  id: string;
  status: ObservationStatus;
  code: {
    coding: Array<{ system: string; code: string; display: string }>;
    text: string;
  };
  subject: { reference: string };
  device: { display: string };
  effectiveDateTime: string;
  issued: string;
  valueQuantity: { value: number; unit: string };
}

export interface FhirBundle {
  resourceType: 'Bundle';
  type: 'collection';
  total: number;
  entry: Array<{ fullUrl: string; resource: FhirObservation }>;
}

export function mapObservationToFhir(observation: Observation): FhirObservation {
  const definition = OBSERVATION_CODES[observation.code];
  return {
    resourceType: 'Observation',
    id: observation.id,
    status: observation.status,
    code: {
      coding: [{ system: definition.system, code: definition.code, display: definition.display }],
      text: definition.display,
    },
    subject: { reference: `Patient/${observation.patientId}` },
    device: { display: observation.deviceId },
    effectiveDateTime: observation.effectiveTime.toISOString(),
    issued: observation.recordedAt.toISOString(),
    valueQuantity: { value: observation.value, unit: observation.unit },
  };
}

export function mapObservationsToBundle(observations: Observation[]): FhirBundle {
  return {
    resourceType: 'Bundle',
    type: 'collection',
    total: observations.length,
    entry: observations.map((observation) => ({
      fullUrl: `Observation/${observation.id}`,
      resource: mapObservationToFhir(observation),
    })),
  };
}

export function mapObservationToResponse(observation: Observation) {
  return {
    id: observation.id,
    patientId: observation.patientId,
    deviceId: observation.deviceId,
    code: observation.code,
    value: observation.value,
    unit: observation.unit,
    status: observation.status,
    effectiveTime: observation.effectiveTime.toISOString(),
    recordedAt: observation.recordedAt.toISOString(),
  };
}

export function mapAuditEntryToResponse(entry: AuditEntry) {
  return {
    id: entry.id,
    timestamp: entry.timestamp.toISOString(),
    actorId: entry.actorId,
    actorRole: entry.actorRole,
    action: entry.action,
    resourceType: entry.resourceType,
    resourceId: entry.resourceId,
    patientId: entry.patientId,
    requestContext: entry.requestContext,
    statusCode: entry.statusCode,
    errorMessage: entry.errorMessage,
    metadata: entry.metadata,
  };
}
