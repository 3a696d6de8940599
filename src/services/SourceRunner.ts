import { systemActor } from '../domain/entities/AuditEntry.js';
import { describeError } from '../domain/errors.js';
import type { ReadingSource } from '../infra/sources/ReadingSource.js';
import { logger } from '../infra/logger.js';
import type { PipelineCoordinator } from './PipelineCoordinator.js';

export interface SourceRunStats {
  received: number;
  accepted: number;
  rejected: number;
}

/**
 * SourceRunner - drains a ReadingSource into the coordinator
 *
 * One sample is taken to completion (or recorded failure) before the next
 * is read, so a source's samples are persisted in the order it produced them.
 */
export class SourceRunner {
  private controller: AbortController | null = null;
  private running: Promise<SourceRunStats> | null = null;

  constructor(
    private source: ReadingSource,
    private coordinator: PipelineCoordinator
  ) {}

  start(): Promise<SourceRunStats> {
    if (this.running) return this.running;

    this.controller = new AbortController();
    this.running = this.consume(this.controller.signal);
    logger.info('Reading source started', { source: this.source.name });
    return this.running;
  }

  async stop(): Promise<SourceRunStats | null> {
    if (!this.controller || !this.running) return null;

    this.controller.abort();
    const stats = await this.running;
    this.controller = null;
    this.running = null;
    logger.info('Reading source stopped', { source: this.source.name, ...stats });
    return stats;
  }

  private async consume(signal: AbortSignal): Promise<SourceRunStats> {
    const stats: SourceRunStats = { received: 0, accepted: 0, rejected: 0 };
    const context = {
      actor: systemActor(`source:${this.source.name}`),
      source: this.source.name,
    };

    try {
      for await (const sample of this.source.samples(signal)) {
        stats.received += 1;
        const result = await this.coordinator.run(sample, context);
        if (result.state === 'done') {
          stats.accepted += 1;
        } else {
          stats.rejected += 1;
        }
        if (signal.aborted) break;
      }
    } catch (error) {
      logger.error('Reading source terminated unexpectedly', {
        source: this.source.name,
        error: describeError(error),
      });
    }

    return stats;
  }
}
