import type { Logger } from 'pino';

import { createChildLogger } from '../utils/logger.js';
import { DecodeError, ProcessingError, toError } from '../utils/errors.js';
import { decodeImage, encodeGrayJpeg, DEFAULT_JPEG_QUALITY, type DecodedImage } from '../utils/image-utils.js';
import { startNanoTimer } from '../utils/timer.js';
import type { RawImage } from '../utils/raw-image.js';
import type { ProcessingPath } from '../types/pipeline.types.js';
import type { EdgeProcessor, EdgeProcessorOptions, ProcessorOutput } from './types.js';

/**
 * Shared decode -> edges -> encode flow. Subclasses supply computeEdges().
 */
export abstract class BaseEdgeProcessor implements EdgeProcessor {
  abstract readonly path: ProcessingPath;

  protected readonly jpegQuality: number;
  protected readonly logger: Logger;

  constructor(service: string, options: EdgeProcessorOptions = {}) {
    this.jpegQuality = options.jpegQuality ?? DEFAULT_JPEG_QUALITY;
    this.logger = createChildLogger({ service });
  }

  abstract computeEdges(image: DecodedImage): Promise<Uint8Array>;

  async process(image: RawImage): Promise<ProcessorOutput> {
    const elapsed = startNanoTimer();
    image.retain();

    try {
      const bytes = image.bytes;

      let decoded: DecodedImage;
      try {
        decoded = await decodeImage(bytes);
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        this.logger.warn(
          { bytes: bytes.length, error: error.originalError?.message ?? error.message },
          'Input is not a decodable image, passing original bytes through'
        );
        return { data: bytes, durationNanos: elapsed(), degraded: true };
      }

      const edges = await this.computeEdges(decoded);
      const data = await encodeGrayJpeg(edges, decoded.width, decoded.height, this.jpegQuality);

      return { data, durationNanos: elapsed(), degraded: false };
    } catch (error) {
      if (error instanceof ProcessingError) throw error;
      throw new ProcessingError('Edge detection failed', this.path, toError(error));
    } finally {
      image.release();
    }
  }

  async close(): Promise<void> {
    // Nothing owned by default
  }
}
