import { BaseEdgeProcessor } from './base.js';
import { BandWorkerPool } from './worker-pool.js';
import { splitRows } from './sobel.js';
import type { DecodedImage } from '../utils/image-utils.js';
import type { EdgeProcessorOptions } from './types.js';

export interface ParallelEdgeProcessorOptions extends EdgeProcessorOptions {
  /** Worker thread count (default: available hardware parallelism) */
  workerCount?: number;
  /** Externally owned pool; closed by this processor's close() */
  pool?: BandWorkerPool;
}

/**
 * ParallelEdgeProcessor - multi-threaded Sobel.
 *
 * Rows are split into one contiguous band per worker. Grayscale runs on
 * every band, then all workers join before the Sobel pass starts, so each
 * band reads the row above and below its edges from a finished gray plane.
 * This is a CPU-thread simulation of accelerated execution, not a device offload.
 */
export class ParallelEdgeProcessor extends BaseEdgeProcessor {
  readonly path = 'fast' as const;
  private readonly pool: BandWorkerPool;

  constructor(options: ParallelEdgeProcessorOptions = {}) {
    super('parallel-edge-processor', options);
    this.pool = options.pool ?? new BandWorkerPool({ size: options.workerCount, path: this.path });
  }

  get workerCount(): number {
    return this.pool.size;
  }

  async computeEdges(image: DecodedImage): Promise<Uint8Array> {
    const { width, height, channels } = image;
    const pixels = new SharedArrayBuffer(image.data.length);
    new Uint8Array(pixels).set(image.data);
    const gray = new SharedArrayBuffer(width * height);
    const edges = new SharedArrayBuffer(width * height);

    const bands = splitRows(height, this.pool.size);

    await this.pool.run(
      bands.map(([startRow, endRow]) => ({
        kind: 'grayscale' as const,
        pixels,
        channels,
        gray,
        width,
        startRow,
        endRow,
      }))
    );

    await this.pool.run(
      bands.map(([startRow, endRow]) => ({
        kind: 'sobel' as const,
        gray,
        edges,
        width,
        height,
        startRow,
        endRow,
      }))
    );

    return new Uint8Array(edges);
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
