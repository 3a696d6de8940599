import { StoreConstraintError } from '../errors.js';

/**
 * Observation entity - canonical, validated record of one sensor reading
 * Immutable once persisted except for status
 */
export type ObservationStatus = 'registered' | 'preliminary' | 'final' | 'amended';

export const OBSERVATION_STATUSES: readonly ObservationStatus[] = [
  'registered',
  'preliminary',
  'final',
  'amended',
];

export interface Observation {
  id: string;
  patientId: string;
  deviceId: string;
  code: ObservationCode;
  value: number;
  unit: string;
  effectiveTime: Date;
  status: ObservationStatus;
  recordedAt: Date;
}

export type ObservationCode = 'sound';

export interface ObservationCodeDefinition {
  code: ObservationCode;
  system: string;
  display: string;
  aliases: readonly string[];
  range: { min: number; max: number };
}

/**
 * Recognized observation codes.
 * Sound range is the sensor's analog-to-digital span.
 */
export const OBSERVATION_CODES: Record<ObservationCode, ObservationCodeDefinition> = {
  sound: {
    code: 'sound',
    system: 'http://loinc.org',
    display: 'Sound Level',
    aliases: ['sound', 'soundlevel', 'sound_level'],
    range: { min: 0, max: 1023 },
  },
};

/**
 * Resolve an inbound code (any alias, any case) to its canonical code
 */
export function resolveObservationCode(raw: string): ObservationCode | null {
  const normalized = raw.trim().toLowerCase();
  for (const definition of Object.values(OBSERVATION_CODES)) {
    if (definition.aliases.includes(normalized)) {
      return definition.code;
    }
  }
  return null;
}

const statusTransitions: Record<ObservationStatus, ObservationStatus[]> = {
  registered: ['preliminary', 'final', 'amended'],
  preliminary: ['final', 'amended'],
  final: ['amended'],
  amended: [],
};

export function canTransitionStatus(from: ObservationStatus, to: ObservationStatus): boolean {
  return statusTransitions[from].includes(to);
}

export function isObservationStatus(value: unknown): value is ObservationStatus {
  return typeof value === 'string' && OBSERVATION_STATUSES.some((status) => status === value);
}

/**
 * Returns the first violated storage invariant, or null.
 * Stores call this as a second line of defense behind the Validator.
 */
export function findInvariantViolation(observation: Observation): string | null {
  if (observation.patientId.trim().length === 0) return 'patientId must not be empty';
  if (observation.deviceId.trim().length === 0) return 'deviceId must not be empty';
  if (observation.unit.trim().length === 0) return 'unit must not be empty';

  const definition = OBSERVATION_CODES[observation.code];
  if (!definition) return `unrecognized code ${String(observation.code)}`;
  if (!Number.isFinite(observation.value)) return 'value must be finite';

  const { min, max } = definition.range;
  if (observation.value < min || observation.value > max) {
    return `value ${observation.value} outside ${min}..${max}`;
  }
  if (!isObservationStatus(observation.status)) return `invalid status ${String(observation.status)}`;
  return null;
}

/**
 * Store-side guard: throws StoreConstraintError when the observation breaks an invariant.
 */
export function assertObservationInvariants(observation: Observation): void {
  const violation = findInvariantViolation(observation);
  if (violation) {
    throw new StoreConstraintError(`Observation rejected by store: ${violation}`, {
      constraint: 'invariant',
    });
  }
}
