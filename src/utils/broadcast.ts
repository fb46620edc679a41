/**
 * Result Broadcaster
 *
 * Hot multi-subscriber stream: each published value is produced once and
 * fanned out to every current subscriber. Late subscribers see only what is
 * published after they subscribe.
 */

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'result-broadcaster' });

export const DEFAULT_SUBSCRIBER_BUFFER_SIZE = 16;

export interface ResultBroadcasterOptions {
  /** Values buffered per subscriber before the oldest is dropped */
  bufferSize?: number;
}

/**
 * A subscriber's view of the stream. `dropped` counts values discarded
 * because this subscriber fell more than the buffer size behind.
 */
export interface ResultSubscription<T> extends AsyncIterableIterator<T> {
  readonly dropped: number;
}

interface SubscriberState<T> {
  id: number;
  buffer: Array<{ value: T }>;
  waiters: Array<(result: IteratorResult<T>) => void>;
  done: boolean;
  dropped: number;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class ResultBroadcaster<T> {
  private readonly bufferSize: number;
  private readonly subscriptions = new Set<SubscriberState<T>>();
  private nextId = 0;
  private closed = false;

  constructor(options: ResultBroadcasterOptions = {}) {
    this.bufferSize = Math.max(1, options.bufferSize ?? DEFAULT_SUBSCRIBER_BUFFER_SIZE);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  subscriberCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Subscribe to values published from now on. The iterator completes when
   * the broadcaster closes; calling return() unsubscribes early.
   */
  subscribe(): ResultSubscription<T> {
    const subscription: SubscriberState<T> = {
      id: ++this.nextId,
      buffer: [],
      waiters: [],
      done: this.closed,
      dropped: 0,
    };
    if (!this.closed) {
      this.subscriptions.add(subscription);
    }

    const iterator: ResultSubscription<T> = {
      get dropped(): number {
        return subscription.dropped;
      },
      next: (): Promise<IteratorResult<T>> => {
        const entry = subscription.buffer.shift();
        if (entry) {
          return Promise.resolve<IteratorResult<T>>({ done: false, value: entry.value });
        }
        if (subscription.done) {
          return Promise.resolve(DONE);
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          subscription.waiters.push(resolve);
        });
      },
      return: (): Promise<IteratorResult<T>> => {
        this.subscriptions.delete(subscription);
        subscription.buffer = [];
        this.finish(subscription);
        return Promise.resolve(DONE);
      },
      [Symbol.asyncIterator]: () => iterator,
    };

    return iterator;
  }

  /**
   * Deliver a value to every subscriber. Returns how many received it.
   */
  publish(value: T): number {
    if (this.closed) {
      logger.debug('Ignoring publish after close');
      return 0;
    }

    for (const subscription of this.subscriptions) {
      const waiter = subscription.waiters.shift();
      if (waiter) {
        waiter({ done: false, value });
        continue;
      }

      subscription.buffer.push({ value });
      if (subscription.buffer.length > this.bufferSize) {
        subscription.buffer.shift();
        subscription.dropped++;
        logger.warn(
          { subscriber: subscription.id, bufferSize: this.bufferSize, dropped: subscription.dropped },
          'Subscriber is falling behind, dropped oldest result'
        );
      }
    }

    return this.subscriptions.size;
  }

  /**
   * Complete every subscriber. Values already buffered are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const subscription of this.subscriptions) {
      this.finish(subscription);
    }
    this.subscriptions.clear();
  }

  private finish(subscription: SubscriberState<T>): void {
    subscription.done = true;
    const waiters = subscription.waiters;
    subscription.waiters = [];
    for (const waiter of waiters) {
      waiter(DONE);
    }
  }
}
