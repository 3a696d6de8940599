import { z } from 'zod';
import type { RawSample } from '../../domain/entities/RawSample.js';
import { ValidationError } from '../../domain/errors.js';

const timestampSchema = z.union([z.string().min(1), z.number()]).transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
    return z.NEVER;
  }
  return date;
});

// Devices post snake_case (`ts` or `observed_at`); dashboard tools post camelCase
const ingestPayloadSchema = z.object({
  patient_id: z.string().optional(),
  patientId: z.string().optional(),
  device_id: z.string().optional(),
  deviceId: z.string().optional(),
  code: z.string(),
  value: z.number(),
  unit: z.string().default(''),
  ts: timestampSchema.optional(),
  observed_at: timestampSchema.optional(),
  observedAt: timestampSchema.optional(),
});

/** A blank key in one spelling must not hide a populated one in the other. */
function firstNonBlank(...values: (string | undefined)[]): string {
  return values.find((value) => value !== undefined && value.trim().length > 0) ?? '';
}

export type IngestPayloadResult =
  | { ok: true; sample: RawSample }
  | { ok: false; error: ValidationError };

/**
 * Normalize an HTTP ingest body into a RawSample.
 * Only structure is checked here; domain constraints belong to the Validator.
 */
export function parseIngestPayload(body: unknown, now: () => Date = () => new Date()): IngestPayloadResult {
  const parsed = ingestPayloadSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      error: new ValidationError(
        'Invalid ingest payload',
        'INVALID_PAYLOAD',
        null,
        null,
        parsed.error.flatten()
      ),
    };
  }

  const data = parsed.data;
  return {
    ok: true,
    sample: {
      patientId: firstNonBlank(data.patientId, data.patient_id),
      deviceId: firstNonBlank(data.deviceId, data.device_id),
      code: data.code,
      value: data.value,
      unit: data.unit,
      observedAt: data.observedAt ?? data.observed_at ?? data.ts ?? now(),
    },
  };
}
