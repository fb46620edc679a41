import { BaseEdgeProcessor } from './base.js';
import { BandWorkerPool } from './worker-pool.js';
import type { DecodedImage } from '../utils/image-utils.js';
import type { EdgeProcessorOptions } from './types.js';

export interface ReferenceEdgeProcessorOptions extends EdgeProcessorOptions {
  /** Externally owned single-worker pool; closed by this processor's close() */
  pool?: BandWorkerPool;
}

/**
 * ReferenceEdgeProcessor - single-threaded baseline.
 *
 * Both passes cover the whole image top-to-bottom as one band on one
 * dedicated worker thread, keeping the event loop free while it runs.
 */
export class ReferenceEdgeProcessor extends BaseEdgeProcessor {
  readonly path = 'reference' as const;
  private readonly pool: BandWorkerPool;

  constructor(options: ReferenceEdgeProcessorOptions = {}) {
    super('reference-edge-processor', options);
    this.pool = options.pool ?? new BandWorkerPool({ size: 1, path: this.path });
  }

  async computeEdges(image: DecodedImage): Promise<Uint8Array> {
    const { width, height, channels } = image;
    const pixels = new SharedArrayBuffer(image.data.length);
    new Uint8Array(pixels).set(image.data);
    const gray = new SharedArrayBuffer(width * height);
    const edges = new SharedArrayBuffer(width * height);

    await this.pool.run([{ kind: 'grayscale', pixels, channels, gray, width, startRow: 0, endRow: height }]);
    await this.pool.run([{ kind: 'sobel', gray, edges, width, height, startRow: 0, endRow: height }]);

    return new Uint8Array(edges);
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
