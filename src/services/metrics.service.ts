import { ValidationError } from '../utils/errors.js';
import type { MetricsSnapshot } from '../types/pipeline.types.js';

/**
 * Cell layout of the shared counter array
 */
const CELL = {
  DOWNLOADS: 0,
  BYTES: 1,
  FRAMES: 2,
  TOTAL_NANOS: 3,
  FAST_NANOS: 4,
  REFERENCE_NANOS: 5,
  MIN_LATENCY_MS: 6,
  MAX_LATENCY_MS: 7,
  STARTED_AT_MS: 8,
} as const;

const CELL_COUNT = 9;

/** Stands in for +infinity until the first frame is recorded */
const NO_MIN_LATENCY = 0x7fffffffffffffffn;

const NANOS_PER_MILLI = 1_000_000;

export interface MetricsCollectorOptions {
  /** Wall clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

function toCount(value: number, field: string): bigint {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative finite number`, { field, value });
  }
  return BigInt(Math.trunc(value));
}

/**
 * MetricsCollector - lock-free throughput and latency statistics.
 *
 * Every counter lives in a BigInt64Array over a SharedArrayBuffer and each
 * mutation is a single Atomics operation, so writers never block each other
 * and the backing memory can be handed to worker threads. Readers may see a
 * field that has not yet caught up with a sibling field.
 */
export class MetricsCollector {
  private readonly cells: BigInt64Array;
  private readonly now: () => number;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? Date.now;
    this.cells = new BigInt64Array(new SharedArrayBuffer(CELL_COUNT * BigInt64Array.BYTES_PER_ELEMENT));
    this.reset();
  }

  recordDownload(bytes: number): void {
    const size = toCount(bytes, 'bytes');
    Atomics.add(this.cells, CELL.DOWNLOADS, 1n);
    Atomics.add(this.cells, CELL.BYTES, size);
  }

  /**
   * Record one completed round. Min/max latency are tracked in whole milliseconds.
   */
  recordProcessing(durationNanos: number): void {
    const nanos = toCount(durationNanos, 'durationNanos');
    Atomics.add(this.cells, CELL.TOTAL_NANOS, nanos);
    Atomics.add(this.cells, CELL.FRAMES, 1n);

    const millis = nanos / BigInt(NANOS_PER_MILLI);
    this.updateMin(millis);
    this.updateMax(millis);
  }

  recordFastProcessing(durationNanos: number): void {
    Atomics.add(this.cells, CELL.FAST_NANOS, toCount(durationNanos, 'durationNanos'));
  }

  recordReferenceProcessing(durationNanos: number): void {
    Atomics.add(this.cells, CELL.REFERENCE_NANOS, toCount(durationNanos, 'durationNanos'));
  }

  averageLatencyMs(): number {
    return this.perFrameMillis(CELL.TOTAL_NANOS);
  }

  fastAverageLatencyMs(): number {
    return this.perFrameMillis(CELL.FAST_NANOS);
  }

  referenceAverageLatencyMs(): number {
    return this.perFrameMillis(CELL.REFERENCE_NANOS);
  }

  /**
   * Cumulative reference time over cumulative fast time; 1.0 when no fast time was recorded
   */
  speedup(): number {
    const fast = this.read(CELL.FAST_NANOS);
    if (fast === 0) return 1.0;
    return this.read(CELL.REFERENCE_NANOS) / fast;
  }

  /**
   * Frames per second since construction or the last reset
   */
  throughputPerSec(): number {
    const elapsedMs = this.now() - this.read(CELL.STARTED_AT_MS);
    if (elapsedMs <= 0) return 0;
    return (this.read(CELL.FRAMES) * 1000) / elapsedMs;
  }

  minLatencyMs(): number {
    const min = Atomics.load(this.cells, CELL.MIN_LATENCY_MS);
    return min === NO_MIN_LATENCY ? 0 : Number(min);
  }

  maxLatencyMs(): number {
    return this.read(CELL.MAX_LATENCY_MS);
  }

  totalDownloads(): number {
    return this.read(CELL.DOWNLOADS);
  }

  totalBytes(): number {
    return this.read(CELL.BYTES);
  }

  totalFrames(): number {
    return this.read(CELL.FRAMES);
  }

  startedAt(): number {
    return this.read(CELL.STARTED_AT_MS);
  }

  /**
   * Restore the initial state and restart the throughput clock
   */
  reset(): void {
    Atomics.store(this.cells, CELL.DOWNLOADS, 0n);
    Atomics.store(this.cells, CELL.BYTES, 0n);
    Atomics.store(this.cells, CELL.FRAMES, 0n);
    Atomics.store(this.cells, CELL.TOTAL_NANOS, 0n);
    Atomics.store(this.cells, CELL.FAST_NANOS, 0n);
    Atomics.store(this.cells, CELL.REFERENCE_NANOS, 0n);
    Atomics.store(this.cells, CELL.MIN_LATENCY_MS, NO_MIN_LATENCY);
    Atomics.store(this.cells, CELL.MAX_LATENCY_MS, 0n);
    Atomics.store(this.cells, CELL.STARTED_AT_MS, BigInt(Math.trunc(this.now())));
  }

  snapshot(): MetricsSnapshot {
    return {
      totalDownloads: this.totalDownloads(),
      totalBytes: this.totalBytes(),
      totalFrames: this.totalFrames(),
      totalProcessingNanos: this.read(CELL.TOTAL_NANOS),
      fastProcessingNanos: this.read(CELL.FAST_NANOS),
      referenceProcessingNanos: this.read(CELL.REFERENCE_NANOS),
      minLatencyMs: this.minLatencyMs(),
      maxLatencyMs: this.maxLatencyMs(),
      averageLatencyMs: this.averageLatencyMs(),
      fastAverageLatencyMs: this.fastAverageLatencyMs(),
      referenceAverageLatencyMs: this.referenceAverageLatencyMs(),
      speedup: this.speedup(),
      throughputPerSec: this.throughputPerSec(),
      startedAt: this.startedAt(),
    };
  }

  private read(cell: number): number {
    return Number(Atomics.load(this.cells, cell));
  }

  private perFrameMillis(cell: number): number {
    const frames = this.read(CELL.FRAMES);
    if (frames === 0) return 0;
    return this.read(cell) / frames / NANOS_PER_MILLI;
  }

  private updateMin(value: bigint): void {
    let current = Atomics.load(this.cells, CELL.MIN_LATENCY_MS);
    while (value < current) {
      const witnessed = Atomics.compareExchange(this.cells, CELL.MIN_LATENCY_MS, current, value);
      if (witnessed === current) return;
      current = witnessed;
    }
  }

  private updateMax(value: bigint): void {
    let current = Atomics.load(this.cells, CELL.MAX_LATENCY_MS);
    while (value > current) {
      const witnessed = Atomics.compareExchange(this.cells, CELL.MAX_LATENCY_MS, current, value);
      if (witnessed === current) return;
      current = witnessed;
    }
  }
}
