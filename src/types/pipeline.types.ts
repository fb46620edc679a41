/**
 * Pipeline Types
 * Records exchanged between the fetcher, the edge processors, the orchestrator and its consumers.
 */

/**
 * Which edge-detection path produced an output
 */
export type ProcessingPath = 'fast' | 'reference';

/**
 * Output of one processing path for one round.
 * Only the field for the producing path is set.
 */
export interface PartialResult {
  path: ProcessingPath;
  output: Buffer;
  durationNanos: number;
  originalSizeBytes: number;
}

/**
 * Merged output of both processing paths for one round
 */
export interface ProcessedResult {
  readonly fastOutput?: Buffer;
  readonly referenceOutput?: Buffer;
  readonly fastDurationNanos: number;
  readonly referenceDurationNanos: number;
  readonly originalSizeBytes: number;
}

/**
 * One connected bright region in a frame
 */
export interface FlareEvent {
  /** Centroid column */
  x: number;
  /** Centroid row */
  y: number;
  /** Pixel count */
  size: number;
  /** Average grayscale brightness */
  intensity: number;
}

/**
 * Point-in-time copy of the metrics collector
 */
export interface MetricsSnapshot {
  readonly totalDownloads: number;
  readonly totalBytes: number;
  readonly totalFrames: number;
  readonly totalProcessingNanos: number;
  readonly fastProcessingNanos: number;
  readonly referenceProcessingNanos: number;
  readonly minLatencyMs: number;
  readonly maxLatencyMs: number;
  readonly averageLatencyMs: number;
  readonly fastAverageLatencyMs: number;
  readonly referenceAverageLatencyMs: number;
  readonly speedup: number;
  readonly throughputPerSec: number;
  /** Epoch milliseconds of construction or last reset */
  readonly startedAt: number;
}

export type PipelineState = 'idle' | 'running' | 'stopped';
