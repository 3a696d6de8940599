import type { RawSample } from '../../domain/entities/RawSample.js';

/**
 * A lazy, restartable stream of raw samples.
 * Infinite while the underlying transport is alive; ends only when `signal` aborts.
 * Transport faults are handled inside the source and never end the stream.
 */
export interface ReadingSource {
  readonly name: string;
  samples(signal: AbortSignal): AsyncIterable<RawSample>;
}
