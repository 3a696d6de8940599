import { randomUUID } from 'node:crypto';
import type { Observation } from '../domain/entities/Observation.js';
import { SubscriberError, describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * Outbound side of one live connection (SSE response, WebSocket).
 * `send` resolves once the transport accepted the item and rejects when the client is gone.
 */
export interface SubscriberTransport {
  send(observation: Observation): Promise<void>;
}

export interface SubscriberHandle {
  readonly id: string;
  readonly connectedAt: Date;
}

export interface SubscribeOptions {
  label?: string;
  /** Observations this subscriber wants; others never enter its queue. */
  filter?: (observation: Observation) => boolean;
  /** Called once when the hub drops this subscriber after a failed send. */
  onRemoved?: (error: SubscriberError) => void;
}

export interface SubscriberSnapshot {
  id: string;
  label: string | null;
  connectedAt: Date;
  queued: number;
  delivered: number;
  dropped: number;
}

export interface BroadcastStats {
  subscribers: number;
  published: number;
  dropped: number;
  removedOnError: number;
}

interface Subscriber extends SubscriberHandle {
  label: string | null;
  transport: SubscriberTransport;
  queue: Observation[];
  delivered: number;
  dropped: number;
  pumping: Promise<void> | null;
  filter?: (observation: Observation) => boolean;
  onRemoved?: (error: SubscriberError) => void;
}

/**
 * BroadcastHub - fan-out of accepted observations to live subscribers
 *
 * The hub owns the subscriber registry; it is only mutated through
 * subscribe/unsubscribe and the hub's own failure handling, and publish
 * iterates a snapshot of it.
 *
 * Each subscriber has a bounded queue drained by its own pump. When the
 * queue is full the oldest queued observation is dropped (most-recent-wins).
 * A failed send removes that subscriber only.
 */
export class BroadcastHub {
  private subscribers = new Map<string, Subscriber>();
  private published = 0;
  private dropped = 0;
  private removedOnError = 0;

  constructor(private options: { queueCapacity: number }) {
    if (!Number.isInteger(options.queueCapacity) || options.queueCapacity < 1) {
      throw new RangeError('queueCapacity must be a positive integer');
    }
  }

  subscribe(transport: SubscriberTransport, options: SubscribeOptions = {}): SubscriberHandle {
    const subscriber: Subscriber = {
      id: randomUUID(),
      connectedAt: new Date(),
      label: options.label ?? null,
      transport,
      queue: [],
      delivered: 0,
      dropped: 0,
      pumping: null,
      filter: options.filter,
      onRemoved: options.onRemoved,
    };

    this.subscribers.set(subscriber.id, subscriber);
    logger.info('Live subscriber connected', {
      subscriberId: subscriber.id,
      label: subscriber.label,
      subscribers: this.subscribers.size,
    });

    return { id: subscriber.id, connectedAt: subscriber.connectedAt };
  }

  unsubscribe(handle: SubscriberHandle): boolean {
    const subscriber = this.subscribers.get(handle.id);
    if (!subscriber) return false;

    this.subscribers.delete(handle.id);
    subscriber.queue.length = 0;
    logger.info('Live subscriber disconnected', {
      subscriberId: subscriber.id,
      delivered: subscriber.delivered,
      dropped: subscriber.dropped,
      subscribers: this.subscribers.size,
    });
    return true;
  }

  /**
   * Enqueue an observation for every subscriber connected right now whose filter accepts it.
   * Never throws and never waits on a subscriber; returns the fan-out width.
   */
  publish(observation: Observation): number {
    this.published += 1;
    const targets = [...this.subscribers.values()].filter((subscriber) =>
      this.accepts(subscriber, observation)
    );

    for (const subscriber of targets) {
      if (subscriber.queue.length >= this.options.queueCapacity) {
        subscriber.queue.shift();
        subscriber.dropped += 1;
        this.dropped += 1;
      }
      subscriber.queue.push(observation);

      if (!subscriber.pumping) {
        subscriber.pumping = this.pump(subscriber).finally(() => {
          subscriber.pumping = null;
        });
      }
    }

    return targets.length;
  }

  /**
   * Resolves once every subscriber has drained its queue (or been removed).
   */
  async whenIdle(): Promise<void> {
    let pending = this.pendingPumps();
    while (pending.length > 0) {
      await Promise.all(pending);
      pending = this.pendingPumps();
    }
  }

  getSubscriber(handle: SubscriberHandle): SubscriberSnapshot | null {
    const subscriber = this.subscribers.get(handle.id);
    if (!subscriber) return null;
    return {
      id: subscriber.id,
      label: subscriber.label,
      connectedAt: subscriber.connectedAt,
      queued: subscriber.queue.length,
      delivered: subscriber.delivered,
      dropped: subscriber.dropped,
    };
  }

  stats(): BroadcastStats {
    return {
      subscribers: this.subscribers.size,
      published: this.published,
      dropped: this.dropped,
      removedOnError: this.removedOnError,
    };
  }

  private accepts(subscriber: Subscriber, observation: Observation): boolean {
    if (!subscriber.filter) return true;
    try {
      return subscriber.filter(observation);
    } catch (error) {
      logger.warn('Subscriber filter failed; observation skipped', {
        subscriberId: subscriber.id,
        error: describeError(error),
      });
      return false;
    }
  }

  private pendingPumps(): Promise<void>[] {
    const pending: Promise<void>[] = [];
    for (const subscriber of this.subscribers.values()) {
      if (subscriber.pumping) pending.push(subscriber.pumping);
    }
    return pending;
  }

  private async pump(subscriber: Subscriber): Promise<void> {
    while (this.subscribers.get(subscriber.id) === subscriber) {
      const next = subscriber.queue.shift();
      if (next === undefined) return;

      try {
        await subscriber.transport.send(next);
        subscriber.delivered += 1;
      } catch (error) {
        this.removeFailed(
          subscriber,
          new SubscriberError(`Delivery to subscriber failed: ${describeError(error)}`, subscriber.id, {
            cause: error,
          })
        );
        return;
      }
    }
  }

  private removeFailed(subscriber: Subscriber, error: SubscriberError): void {
    if (this.subscribers.get(subscriber.id) !== subscriber) return;

    this.subscribers.delete(subscriber.id);
    subscriber.queue.length = 0;
    this.removedOnError += 1;
    logger.warn('Live subscriber removed after failed send', {
      subscriberId: subscriber.id,
      label: subscriber.label,
      error: error.message,
      subscribers: this.subscribers.size,
    });

    if (subscriber.onRemoved) {
      try {
        subscriber.onRemoved(error);
      } catch (callbackError) {
        logger.warn('Subscriber removal callback failed', {
          subscriberId: subscriber.id,
          error: describeError(callbackError),
        });
      }
    }
  }
}
