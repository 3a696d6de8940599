import { setTimeout as sleep } from 'node:timers/promises';
import type { RawSample } from '../../domain/entities/RawSample.js';
import type { ReadingSource } from './ReadingSource.js';

export interface SimulatorOptions {
  patientId: string;
  deviceId?: string;
  intervalMs: number;
  random?: () => number;
  now?: () => Date;
}

/**
 * Emits plausible ambient sound levels in [150, 260) at a fixed interval.
 * Lets the pipeline and live feed run without hardware.
 */
export class SimulatedReadingSource implements ReadingSource {
  readonly name: string;

  constructor(private options: SimulatorOptions) {
    this.name = `simulator:${options.deviceId ?? 'simulator-1'}`;
  }

  async *samples(signal: AbortSignal): AsyncGenerator<RawSample> {
    const random = this.options.random ?? Math.random;
    const now = this.options.now ?? (() => new Date());

    while (!signal.aborted) {
      yield {
        patientId: this.options.patientId,
        deviceId: this.options.deviceId ?? 'simulator-1',
        code: 'sound',
        value: Math.floor((150 + random() * 110) * 100) / 100,
        unit: 'au',
        observedAt: now(),
      };

      try {
        await sleep(this.options.intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
      }
    }
  }
}
