import { createChildLogger } from '../utils/logger.js';
import { DecodeError, toError } from '../utils/errors.js';
import { calculateBrightness, decodeImage } from '../utils/image-utils.js';
import { primaryOutput, speedupOf } from '../utils/processed-result.js';
import { formatDuration, nanosToMillis } from '../utils/timer.js';
import { RegionDetector } from './region-detector.service.js';
import type { FlareEvent, ProcessedResult } from '../types/pipeline.types.js';

const logger = createChildLogger({ service: 'flare-monitor' });

/**
 * Results to analyse. Broadcaster subscriptions also report how many
 * results they dropped for falling behind.
 */
export type ResultStream = AsyncIterable<ProcessedResult> & { readonly dropped?: number };

export interface FlareReport {
  /** 1-based position in the stream this monitor consumed */
  frame: number;
  /** Results dropped between the previous analysed frame and this one */
  skipped: number;
  events: FlareEvent[];
  speedup: number;
  /** Mean gray level of the analysed output; null when it could not be decoded */
  brightness: number | null;
}

export interface FlareMonitorOptions {
  detector?: RegionDetector;
  onReport?: (report: FlareReport) => void;
}

/**
 * FlareMonitor - consumes published results and runs region detection on
 * each frame's primary output.
 */
export class FlareMonitor {
  private readonly detector: RegionDetector;
  private readonly onReport?: (report: FlareReport) => void;
  private frames = 0;
  private skippedTotal = 0;
  private last: FlareReport | null = null;

  constructor(
    private readonly stream: ResultStream,
    options: FlareMonitorOptions = {}
  ) {
    this.detector = options.detector ?? new RegionDetector();
    this.onReport = options.onReport;
  }

  latest(): FlareReport | null {
    return this.last;
  }

  /**
   * Analyse frames until the stream ends. Resolves with the frame count.
   */
  async run(): Promise<number> {
    for await (const result of this.stream) {
      const frame = ++this.frames;
      const skipped = this.takeSkipped();
      if (skipped > 0) {
        logger.warn({ frame, skipped, totalSkipped: this.skippedTotal }, 'Flare monitor fell behind, results skipped');
      }

      try {
        const report = await this.analyse(frame, result, skipped);
        this.last = report;
        this.onReport?.(report);
      } catch (error) {
        logger.error({ frame, error: toError(error).message }, 'Flare analysis failed');
      }
    }

    logger.info({ frames: this.frames, skipped: this.skippedTotal }, 'Flare monitor finished');
    return this.frames;
  }

  async analyse(frame: number, result: ProcessedResult, skipped = 0): Promise<FlareReport> {
    const speedup = speedupOf(result);
    let events: FlareEvent[] = [];
    let brightness: number | null = null;

    try {
      const image = await decodeImage(primaryOutput(result));
      events = this.detector.detectInImage(image);
      brightness = calculateBrightness(image);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
    }

    logger.info(
      {
        frame,
        fast: formatDuration(nanosToMillis(result.fastDurationNanos)),
        reference: formatDuration(nanosToMillis(result.referenceDurationNanos)),
        speedup: Number(speedup.toFixed(2)),
        brightness,
        flares: events.length,
      },
      'Frame analysed'
    );
    for (const event of events) {
      logger.info({ frame, ...event }, 'Flare detected');
    }

    return { frame, skipped, events, speedup, brightness };
  }

  private takeSkipped(): number {
    const dropped = this.stream.dropped ?? 0;
    const skipped = dropped - this.skippedTotal;
    this.skippedTotal = dropped;
    return skipped;
  }
}
