/**
 * RawSample - a reading as produced by a source adapter, before validation.
 * Transient; never persisted directly.
 */
export interface RawSample {
  patientId: string;
  deviceId: string;
  code: string;
  value: number;
  unit: string;
  observedAt: Date;
}
