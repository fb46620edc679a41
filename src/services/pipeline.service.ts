import { createChildLogger } from '../utils/logger.js';
import { getConfig, type AppConfig } from '../config/index.js';
import { PipelineStateError, ProcessingError, toError } from '../utils/errors.js';
import { ResultBroadcaster, type ResultSubscription } from '../utils/broadcast.js';
import { mergeResults, speedupOf } from '../utils/processed-result.js';
import { startNanoTimer } from '../utils/timer.js';
import type { RawImage } from '../utils/raw-image.js';
import { MetricsCollector } from './metrics.service.js';
import { ImageFetcher, type FetchResult } from './image-fetcher.service.js';
import { ParallelEdgeProcessor } from '../processors/parallel-edge.processor.js';
import { ReferenceEdgeProcessor } from '../processors/reference-edge.processor.js';
import type { EdgeProcessor, ProcessorOutput } from '../processors/types.js';
import type { MetricsSnapshot, PipelineState, ProcessedResult, ProcessingPath } from '../types/pipeline.types.js';

const logger = createChildLogger({ service: 'pipeline' });

export const DEFAULT_INTERVAL_MS = 5000;
export const DEFAULT_FRAME_LOG_INTERVAL = 10;

/**
 * Where rounds get their images from. ImageFetcher in production.
 */
export interface ImageSource {
  fetch(primaryUrl?: string, signal?: AbortSignal): Promise<FetchResult>;
  close(): Promise<void>;
}

export interface PipelineOrchestratorOptions {
  source: ImageSource;
  fastProcessor: EdgeProcessor;
  referenceProcessor: EdgeProcessor;
  metrics?: MetricsCollector;
  intervalMs?: number;
  /** Log progress every N published frames */
  frameLogInterval?: number;
  /** Per-subscriber buffer before the oldest result is dropped */
  bufferSize?: number;
}

interface ProcessedRound {
  result: ProcessedResult;
  roundNanos: number;
}

/**
 * PipelineOrchestrator - timer-driven fetch, dual-path edge detection and
 * fan-out of merged results.
 *
 * Rounds may overlap when one outlives the interval, but results are
 * published strictly in tick order. A failed round is logged and skipped;
 * the stream only ends on stop(). Stopping aborts in-flight fetches, waits
 * for in-flight processing and discards it unpublished.
 */
export class PipelineOrchestrator {
  public readonly metrics: MetricsCollector;

  private readonly source: ImageSource;
  private readonly fastProcessor: EdgeProcessor;
  private readonly referenceProcessor: EdgeProcessor;
  private readonly intervalMs: number;
  private readonly frameLogInterval: number;
  private readonly broadcaster: ResultBroadcaster<ProcessedResult>;

  private currentState: PipelineState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private ticks = 0;
  private frames = 0;
  /** Settles when the latest round has finished, published or not */
  private lastRound: Promise<void> = Promise.resolve();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly fetchControllers = new Set<AbortController>();
  private stopping: Promise<void> | null = null;

  constructor(options: PipelineOrchestratorOptions) {
    this.source = options.source;
    this.fastProcessor = options.fastProcessor;
    this.referenceProcessor = options.referenceProcessor;
    this.metrics = options.metrics ?? new MetricsCollector();
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.frameLogInterval = Math.max(1, options.frameLogInterval ?? DEFAULT_FRAME_LOG_INTERVAL);
    this.broadcaster = new ResultBroadcaster<ProcessedResult>({ bufferSize: options.bufferSize });
  }

  get state(): PipelineState {
    return this.currentState;
  }

  /**
   * Begin ticking. The first round starts immediately.
   * No-op while running; a stopped pipeline cannot be restarted.
   */
  start(): void {
    if (this.currentState === 'running') return;
    if (this.currentState === 'stopped') {
      throw new PipelineStateError('stopped', 'Pipeline has been stopped; create a new instance to run again');
    }

    this.currentState = 'running';
    this.metrics.reset();
    logger.info({ intervalMs: this.intervalMs }, 'Starting pipeline');

    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /**
   * Stop ticking, drop in-flight rounds and release fetcher, processors and
   * subscribers. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.currentState = 'stopped';
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Results published from now on. Completes when the pipeline stops.
   * A subscriber that falls behind loses its oldest results; see `dropped`.
   */
  subscribe(): ResultSubscription<ProcessedResult> {
    return this.broadcaster.subscribe();
  }

  metricsSnapshot(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  frameCount(): number {
    return this.frames;
  }

  private tick(): void {
    const tick = ++this.ticks;
    const previous = this.lastRound;

    const round: Promise<void> = this.runRound(tick, previous).finally(() => {
      this.inFlight.delete(round);
    });
    this.inFlight.add(round);
    this.lastRound = round;
  }

  /**
   * One fetch-process-publish round. Never rejects.
   */
  private async runRound(tick: number, previous: Promise<void>): Promise<void> {
    const controller = new AbortController();
    this.fetchControllers.add(controller);
    let image: RawImage | undefined;

    try {
      const fetched = await this.source.fetch(undefined, controller.signal);

      if (!fetched.ok) {
        if (this.currentState === 'running') {
          logger.warn(
            { tick, reason: fetched.error.reason, error: fetched.error.message },
            'Image fetch failed, skipping round'
          );
        }
        return;
      }

      image = fetched.image;
      if (this.currentState !== 'running') return;

      const { result, roundNanos } = await this.processImage(image);
      if (this.currentState !== 'running') {
        logger.debug({ tick }, 'Discarding round finished after stop');
        return;
      }

      await previous;
      if (this.currentState !== 'running') {
        logger.debug({ tick }, 'Discarding round finished after stop');
        return;
      }

      // Only published rounds count, so totalFrames tracks frameCount()
      this.metrics.recordProcessing(roundNanos);
      this.metrics.recordFastProcessing(result.fastDurationNanos);
      this.metrics.recordReferenceProcessing(result.referenceDurationNanos);
      this.publish(result);
    } catch (error) {
      logger.error({ tick, error: toError(error).message }, 'Pipeline round failed');
    } finally {
      this.fetchControllers.delete(controller);
      image?.release();
    }
  }

  /**
   * Run both paths on the same image and join. Either path failing fails
   * the round; there is no partial merge.
   */
  private async processImage(image: RawImage): Promise<ProcessedRound> {
    const elapsed = startNanoTimer();
    const [fast, reference] = await Promise.allSettled([
      this.fastProcessor.process(image),
      this.referenceProcessor.process(image),
    ]);
    const roundNanos = elapsed();

    if (fast.status === 'rejected') throw this.pathFailure('fast', fast.reason);
    if (reference.status === 'rejected') throw this.pathFailure('reference', reference.reason);

    this.logDegraded(fast.value, reference.value);

    const originalSizeBytes = image.byteLength;
    const result = mergeResults(
      { path: 'fast', output: fast.value.data, durationNanos: fast.value.durationNanos, originalSizeBytes },
      {
        path: 'reference',
        output: reference.value.data,
        durationNanos: reference.value.durationNanos,
        originalSizeBytes,
      }
    );

    return { result, roundNanos };
  }

  private pathFailure(path: ProcessingPath, reason: unknown): ProcessingError {
    return reason instanceof ProcessingError
      ? reason
      : new ProcessingError('Processing path failed', path, toError(reason));
  }

  private logDegraded(fast: ProcessorOutput, reference: ProcessorOutput): void {
    if (fast.degraded || reference.degraded) {
      logger.debug(
        { fastDegraded: fast.degraded, referenceDegraded: reference.degraded },
        'Frame passed through undecoded'
      );
    }
  }

  private publish(result: ProcessedResult): void {
    this.broadcaster.publish(result);
    const frame = ++this.frames;

    if (frame % this.frameLogInterval === 0) {
      logger.info(
        {
          frame,
          averageLatencyMs: this.metrics.averageLatencyMs(),
          speedup: this.metrics.speedup(),
          lastSpeedup: speedupOf(result),
          throughputPerSec: this.metrics.throughputPerSec(),
        },
        'Pipeline progress'
      );
    }
  }

  private async shutdown(): Promise<void> {
    logger.info({ frames: this.frames, inFlight: this.inFlight.size }, 'Stopping pipeline');

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const controller of this.fetchControllers) {
      controller.abort();
    }

    await Promise.all(this.inFlight);
    this.broadcaster.close();

    const closures = await Promise.allSettled([
      this.source.close(),
      this.fastProcessor.close(),
      this.referenceProcessor.close(),
    ]);
    for (const closure of closures) {
      if (closure.status === 'rejected') {
        logger.error({ error: toError(closure.reason).message }, 'Failed to release pipeline resource');
      }
    }

    logger.info({ frames: this.frames }, 'Pipeline stopped');
  }
}

/**
 * Wire a production pipeline from configuration
 */
export function createPipeline(config: AppConfig = getConfig()): PipelineOrchestrator {
  const metrics = new MetricsCollector();
  const { jpegQuality, workerCount } = config.processing;

  return new PipelineOrchestrator({
    source: new ImageFetcher({
      primaryUrl: config.sources.primaryUrl,
      fallbackUrl: config.sources.fallbackUrl,
      timeoutMs: config.fetch.timeoutMs,
      metrics,
      pool: config.pool,
    }),
    fastProcessor: new ParallelEdgeProcessor({ workerCount, jpegQuality }),
    referenceProcessor: new ReferenceEdgeProcessor({ jpegQuality }),
    metrics,
    intervalMs: config.pipeline.intervalMs,
    frameLogInterval: config.pipeline.frameLogInterval,
    bufferSize: config.stream.bufferSize,
  });
}
