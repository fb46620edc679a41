import { createChildLogger } from '../utils/logger.js';
import { PoolClosedError, PoolExhaustedError, toError } from '../utils/errors.js';

const logger = createChildLogger({ service: 'connection-pool' });

/**
 * Connection pool defaults
 */
export const POOL_DEFAULTS = {
  maxConnections: 10,
  maxIdleMs: 30_000,
  maxLifetimeMs: 5 * 60_000,
  pendingAcquireMax: 50,
  evictionIntervalMs: 60_000,
} as const;

export interface PoolFactory<T> {
  create(): T | Promise<T>;
  destroy(resource: T): void | Promise<void>;
}

export interface ConnectionPoolOptions<T> {
  factory: PoolFactory<T>;
  maxConnections?: number;
  /** Idle connections older than this are evicted */
  maxIdleMs?: number;
  /** Connections older than this are destroyed instead of reused */
  maxLifetimeMs?: number;
  /** Callers allowed to wait for a free connection before acquire fails fast */
  pendingAcquireMax?: number;
  evictionIntervalMs?: number;
  name?: string;
  now?: () => number;
}

export interface PoolLease<T> {
  readonly resource: T;
  /** Return the connection. Safe to call more than once. */
  release(): void;
}

export interface PoolStats {
  idle: number;
  active: number;
  pending: number;
  created: number;
  destroyed: number;
}

interface PooledEntry<T> {
  resource: T;
  createdAt: number;
  lastUsedAt: number;
}

interface Waiter<T> {
  settled: boolean;
  resolve(entry: PooledEntry<T>): void;
  reject(error: Error): void;
}

/**
 * ConnectionPool - bounded pool with a FIFO wait queue, idle/lifetime
 * eviction and a background eviction sweep.
 */
export class ConnectionPool<T> {
  private readonly factory: PoolFactory<T>;
  private readonly maxConnections: number;
  private readonly maxIdleMs: number;
  private readonly maxLifetimeMs: number;
  private readonly pendingAcquireMax: number;
  private readonly name: string;
  private readonly now: () => number;
  private readonly evictionTimer: NodeJS.Timeout;

  private idle: PooledEntry<T>[] = [];
  private waiters: Waiter<T>[] = [];
  private active = 0;
  private creating = 0;
  private created = 0;
  private destroyed = 0;
  private closed = false;

  constructor(options: ConnectionPoolOptions<T>) {
    this.factory = options.factory;
    this.maxConnections = Math.max(1, options.maxConnections ?? POOL_DEFAULTS.maxConnections);
    this.maxIdleMs = options.maxIdleMs ?? POOL_DEFAULTS.maxIdleMs;
    this.maxLifetimeMs = options.maxLifetimeMs ?? POOL_DEFAULTS.maxLifetimeMs;
    this.pendingAcquireMax = Math.max(0, options.pendingAcquireMax ?? POOL_DEFAULTS.pendingAcquireMax);
    this.name = options.name ?? 'pool';
    this.now = options.now ?? Date.now;

    this.evictionTimer = setInterval(
      () => this.evictExpired(),
      options.evictionIntervalMs ?? POOL_DEFAULTS.evictionIntervalMs
    );
    this.evictionTimer.unref();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private get size(): number {
    return this.active + this.idle.length + this.creating;
  }

  /**
   * Borrow a connection, waiting in line when all are in use.
   * Fails fast with PoolExhaustedError once the wait queue is full.
   */
  async acquire(signal?: AbortSignal): Promise<PoolLease<T>> {
    if (this.closed) {
      throw new PoolClosedError(`Connection pool "${this.name}" is closed`);
    }
    signal?.throwIfAborted();

    const reusable = this.takeIdle();
    if (reusable) {
      return this.lease(reusable);
    }

    if (this.size < this.maxConnections) {
      return this.lease(await this.createEntry());
    }

    if (this.waiters.length >= this.pendingAcquireMax) {
      throw new PoolExhaustedError(
        `Connection pool "${this.name}" exhausted: ${this.waiters.length} callers already waiting`
      );
    }

    return this.lease(await this.enqueue(signal));
  }

  /**
   * Destroy idle connections past their idle timeout or lifetime.
   * Returns the number evicted.
   */
  evictExpired(): number {
    const now = this.now();
    const keep: PooledEntry<T>[] = [];
    let evicted = 0;

    for (const entry of this.idle) {
      if (this.isExpired(entry, now)) {
        void this.destroyEntry(entry);
        evicted++;
      } else {
        keep.push(entry);
      }
    }
    this.idle = keep;

    if (evicted > 0) {
      logger.debug({ pool: this.name, evicted, idle: keep.length }, 'Evicted expired connections');
    }
    return evicted;
  }

  /**
   * Stop the eviction sweep, reject waiters and destroy idle connections.
   * Connections still leased are destroyed when released.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.evictionTimer);

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new PoolClosedError(`Connection pool "${this.name}" is closed`));
    }

    const idle = this.idle;
    this.idle = [];
    await Promise.all(idle.map((entry) => this.destroyEntry(entry)));

    logger.debug({ pool: this.name, ...this.stats() }, 'Connection pool closed');
  }

  stats(): PoolStats {
    return {
      idle: this.idle.length,
      active: this.active,
      pending: this.waiters.length,
      created: this.created,
      destroyed: this.destroyed,
    };
  }

  private isExpired(entry: PooledEntry<T>, now: number): boolean {
    return now - entry.lastUsedAt >= this.maxIdleMs || now - entry.createdAt >= this.maxLifetimeMs;
  }

  private takeIdle(): PooledEntry<T> | undefined {
    const now = this.now();
    let entry = this.idle.pop();
    while (entry && this.isExpired(entry, now)) {
      void this.destroyEntry(entry);
      entry = this.idle.pop();
    }
    if (entry) {
      entry.lastUsedAt = now;
      this.active++;
    }
    return entry;
  }

  private async createEntry(): Promise<PooledEntry<T>> {
    this.creating++;
    let resource: T;
    try {
      resource = await this.factory.create();
    } finally {
      this.creating--;
    }

    const now = this.now();
    const entry: PooledEntry<T> = { resource, createdAt: now, lastUsedAt: now };
    this.created++;

    if (this.closed) {
      await this.destroyEntry(entry);
      throw new PoolClosedError(`Connection pool "${this.name}" is closed`);
    }

    this.active++;
    return entry;
  }

  private enqueue(signal?: AbortSignal): Promise<PooledEntry<T>> {
    return new Promise<PooledEntry<T>>((resolve, reject) => {
      let detach = (): void => {};

      const waiter: Waiter<T> = {
        settled: false,
        resolve: (entry) => {
          waiter.settled = true;
          detach();
          resolve(entry);
        },
        reject: (error) => {
          waiter.settled = true;
          detach();
          reject(error);
        },
      };

      if (signal) {
        const onAbort = (): void => {
          if (waiter.settled) return;
          this.waiters = this.waiters.filter((queued) => queued !== waiter);
          waiter.reject(toError(signal.reason));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.waiters.push(waiter);
    });
  }

  private lease(entry: PooledEntry<T>): PoolLease<T> {
    let released = false;
    return {
      resource: entry.resource,
      release: () => {
        if (released) return;
        released = true;
        this.releaseEntry(entry);
      },
    };
  }

  private releaseEntry(entry: PooledEntry<T>): void {
    this.active--;
    const now = this.now();

    if (this.closed || now - entry.createdAt >= this.maxLifetimeMs) {
      void this.destroyEntry(entry);
      this.replaceForWaiter();
      return;
    }

    entry.lastUsedAt = now;
    const waiter = this.waiters.shift();
    if (waiter) {
      this.active++;
      waiter.resolve(entry);
      return;
    }

    this.idle.push(entry);
  }

  /**
   * A destroyed connection frees a slot; open a new one for the head waiter.
   */
  private replaceForWaiter(): void {
    if (this.closed || this.size >= this.maxConnections) return;
    const waiter = this.waiters.shift();
    if (!waiter) return;

    this.createEntry().then(
      (entry) => {
        if (waiter.settled) {
          this.releaseEntry(entry);
        } else {
          waiter.resolve(entry);
        }
      },
      (error: unknown) => waiter.reject(toError(error))
    );
  }

  /**
   * Resolves once the factory has destroyed the resource; never rejects.
   */
  private destroyEntry(entry: PooledEntry<T>): Promise<void> {
    this.destroyed++;
    let outcome: void | Promise<void>;
    try {
      outcome = this.factory.destroy(entry.resource);
    } catch (error) {
      outcome = Promise.reject(error);
    }

    return Promise.resolve(outcome).catch((error: unknown) => {
      logger.warn({ pool: this.name, error: toError(error).message }, 'Failed to destroy pooled connection');
    });
  }
}
