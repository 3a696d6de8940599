import cron, { type ScheduledTask } from 'node-cron';
import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { ObservationStore } from '../infra/repositories/ObservationStore.js';
import type { BroadcastHub } from '../services/BroadcastHub.js';

export interface StatsSnapshot {
  storedObservations: number;
  subscribers: number;
  published: number;
  dropped: number;
  removedOnError: number;
}

/**
 * Cron expression for an interval in minutes.
 * Intervals past an hour run hourly and are gated inside the tick.
 */
export function statsCronExpression(intervalMinutes: number): string {
  return intervalMinutes <= 59 ? `*/${intervalMinutes} * * * *` : '0 * * * *';
}

/**
 * StatsScheduler - periodic operational log of hub and store statistics using node-cron
 */
export class StatsScheduler {
  private task: ScheduledTask | null = null;
  private lastRunAt: number | null = null;

  constructor(
    private intervalMinutes: number,
    private store: ObservationStore,
    private hub: BroadcastHub,
    private now: () => number = Date.now
  ) {}

  start(): void {
    if (this.intervalMinutes < 1) {
      logger.warn('STATS_INTERVAL_MINUTES is less than 1, skipping scheduler');
      return;
    }

    const cronExpression = statsCronExpression(this.intervalMinutes);
    this.task = cron.schedule(cronExpression, async () => {
      await this.tick();
    });

    logger.info('StatsScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('StatsScheduler stopped');
    }
  }

  /**
   * Log one snapshot. Returns null when skipped (interval not yet elapsed) or when the store failed.
   */
  async tick(): Promise<StatsSnapshot | null> {
    const now = this.now();
    if (this.lastRunAt !== null && now - this.lastRunAt < this.intervalMinutes * 60_000 - 1000) {
      return null;
    }
    this.lastRunAt = now;

    try {
      const snapshot: StatsSnapshot = {
        storedObservations: await this.store.count(),
        ...this.hub.stats(),
      };
      logger.info('Pipeline stats', { ...snapshot });
      return snapshot;
    } catch (error) {
      logger.error('Failed to collect pipeline stats', { error: describeError(error) });
      return null;
    }
  }
}

/**
 * Factory function to create and start scheduler
 */
export function startStatsScheduler(
  intervalMinutes: number,
  store: ObservationStore,
  hub: BroadcastHub
): StatsScheduler {
  const scheduler = new StatsScheduler(intervalMinutes, store, hub);
  scheduler.start();
  return scheduler;
}
