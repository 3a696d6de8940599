import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';

const optionalText = z
  .string()
  .trim()
  .min(1)
  .optional();

export const limitParam = z.coerce.number().int().positive().optional();

export const observationQuerySchema = z.object({
  patientId: optionalText,
  deviceId: optionalText,
  since: z.coerce.date().optional(),
  limit: limitParam,
});

export const fhirQuerySchema = z.object({
  patient: optionalText,
  limit: limitParam,
});

export const auditQuerySchema = z.object({
  patientId: optionalText,
  actorId: optionalText,
  limit: limitParam,
});

export const mlQuerySchema = z.object({
  limit: limitParam,
  hoursBack: z.coerce.number().int().positive().optional(),
});

export const streamQuerySchema = z.object({
  patientId: optionalText,
});

/**
 * Parse req.query against a schema, raising INVALID_QUERY on mismatch
 */
export function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.infer<T> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError('Invalid query parameters', 'INVALID_QUERY', null, null, parsed.error.flatten());
  }
  return parsed.data;
}
