/**
 * Edge Processor Types
 */

import type { RawImage } from '../utils/raw-image.js';
import type { DecodedImage } from '../utils/image-utils.js';
import type { ProcessingPath } from '../types/pipeline.types.js';

/**
 * Result of running one processing path over one image
 */
export interface ProcessorOutput {
  /** JPEG-encoded edge image, or the original bytes when the input could not be decoded */
  data: Buffer;
  /** Wall-clock time spent in process(), decode and encode included */
  durationNanos: number;
  /** True when the input was not a decodable image and was passed through */
  degraded: boolean;
}

/**
 * Sobel edge-detection implementation
 */
export interface EdgeProcessor {
  readonly path: ProcessingPath;

  /**
   * Decode, detect edges and re-encode. Never fails on undecodable input.
   */
  process(image: RawImage): Promise<ProcessorOutput>;

  /**
   * Raw single-channel Sobel magnitudes, row-major, width * height bytes
   */
  computeEdges(image: DecodedImage): Promise<Uint8Array>;

  /**
   * Release threads or other resources owned by the processor
   */
  close(): Promise<void>;
}

export interface EdgeProcessorOptions {
  /** JPEG quality of the encoded output (default: 90) */
  jpegQuality?: number;
}
