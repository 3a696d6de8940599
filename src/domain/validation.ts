import { randomUUID } from 'node:crypto';
import { OBSERVATION_CODES, resolveObservationCode } from './entities/Observation.js';
import type { Observation } from './entities/Observation.js';
import type { RawSample } from './entities/RawSample.js';
import { ValidationError } from './errors.js';

export type ValidationResult =
  | { ok: true; observation: Observation }
  | { ok: false; error: ValidationError };

export interface ValidateOptions {
  generateId?: () => string;
  now?: () => Date;
}

const REQUIRED_FIELDS = ['patientId', 'deviceId', 'unit'] as const;

/**
 * Validate a raw sample and build the canonical Observation.
 * Checks run in order and the first failure short-circuits:
 * required fields, recognized code, finite value, physical range.
 *
 * No I/O and no shared state; safe to call from concurrent pipeline runs.
 */
export function validateSample(sample: RawSample, options: ValidateOptions = {}): ValidationResult {
  for (const field of REQUIRED_FIELDS) {
    if (sample[field].trim().length === 0) {
      return fail(new ValidationError(`${field} required`, 'REQUIRED_FIELD', field, sample[field]));
    }
  }

  const code = resolveObservationCode(sample.code);
  if (code === null) {
    return fail(
      new ValidationError(`Unrecognized observation code '${sample.code}'`, 'UNKNOWN_CODE', 'code', sample.code)
    );
  }

  if (!Number.isFinite(sample.value)) {
    return fail(
      new ValidationError('value must be finite', 'NOT_FINITE', 'value', String(sample.value))
    );
  }

  const { min, max } = OBSERVATION_CODES[code].range;
  if (sample.value < min || sample.value > max) {
    return fail(
      new ValidationError(
        `${code} value must be between ${min} and ${max}, got ${sample.value}`,
        'OUT_OF_RANGE',
        'value',
        sample.value
      )
    );
  }

  const now = options.now ?? (() => new Date());
  return {
    ok: true,
    observation: {
      id: (options.generateId ?? randomUUID)(),
      patientId: sample.patientId,
      deviceId: sample.deviceId,
      code,
      value: sample.value,
      unit: sample.unit,
      effectiveTime: sample.observedAt,
      status: 'final',
      recordedAt: now(),
    },
  };
}

function fail(error: ValidationError): ValidationResult {
  return { ok: false, error };
}
