import { createChildLogger } from '../utils/logger.js';
import { DecodeError } from '../utils/errors.js';
import { decodeImage, type DecodedImage } from '../utils/image-utils.js';
import { grayscaleRows } from '../processors/sobel.js';
import type { FlareEvent } from '../types/pipeline.types.js';

const logger = createChildLogger({ service: 'region-detector' });

export const DEFAULT_BRIGHTNESS_THRESHOLD = 200;
export const DEFAULT_MIN_REGION_SIZE = 100;

export interface RegionDetectorOptions {
  /** A pixel is bright when its gray value is strictly above this */
  brightnessThreshold?: number;
  /** Regions with fewer pixels are discarded as noise */
  minRegionSize?: number;
}

/**
 * RegionDetector - finds connected bright regions (flare events) in a frame.
 *
 * Raster scan in row-major order; each unvisited bright pixel seeds a
 * breadth-first flood fill over its 4-connected bright neighbours.
 */
export class RegionDetector {
  private readonly brightnessThreshold: number;
  private readonly minRegionSize: number;

  constructor(options: RegionDetectorOptions = {}) {
    this.brightnessThreshold = options.brightnessThreshold ?? DEFAULT_BRIGHTNESS_THRESHOLD;
    this.minRegionSize = options.minRegionSize ?? DEFAULT_MIN_REGION_SIZE;
  }

  /**
   * Detect regions in encoded image bytes. Empty or undecodable input yields [].
   */
  async detect(bytes: Buffer): Promise<FlareEvent[]> {
    if (bytes.length === 0) return [];

    let image: DecodedImage;
    try {
      image = await decodeImage(bytes);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      logger.debug({ bytes: bytes.length }, 'Skipping region detection for undecodable frame');
      return [];
    }

    const events = this.detectInImage(image);
    if (events.length > 0) {
      logger.info({ count: events.length }, 'Detected flare events');
    }
    return events;
  }

  detectInImage(image: DecodedImage): FlareEvent[] {
    const { width, height } = image;
    const pixelCount = width * height;
    const gray = new Uint8Array(pixelCount);
    grayscaleRows(image.data, image.channels, width, gray, 0, height);

    const visited = new Uint8Array(pixelCount);
    // Each pixel is enqueued at most once, so one slot per pixel suffices
    const queue = new Int32Array(pixelCount);
    const events: FlareEvent[] = [];

    for (let seed = 0; seed < pixelCount; seed++) {
      if (visited[seed] || gray[seed] <= this.brightnessThreshold) continue;

      let head = 0;
      let tail = 0;
      queue[tail++] = seed;
      visited[seed] = 1;

      let size = 0;
      let sumX = 0;
      let sumY = 0;
      let sumIntensity = 0;

      while (head < tail) {
        const index = queue[head++];
        const x = index % width;
        const y = (index - x) / width;

        size++;
        sumX += x;
        sumY += y;
        sumIntensity += gray[index];

        if (x > 0) tail = this.visit(index - 1, gray, visited, queue, tail);
        if (x < width - 1) tail = this.visit(index + 1, gray, visited, queue, tail);
        if (y > 0) tail = this.visit(index - width, gray, visited, queue, tail);
        if (y < height - 1) tail = this.visit(index + width, gray, visited, queue, tail);
      }

      if (size >= this.minRegionSize) {
        events.push({
          x: Math.floor(sumX / size),
          y: Math.floor(sumY / size),
          size,
          intensity: Math.floor(sumIntensity / size),
        });
      }
    }

    return events;
  }

  private visit(index: number, gray: Uint8Array, visited: Uint8Array, queue: Int32Array, tail: number): number {
    if (visited[index] || gray[index] <= this.brightnessThreshold) return tail;
    visited[index] = 1;
    queue[tail] = index;
    return tail + 1;
  }
}
