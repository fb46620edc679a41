import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import sharp from 'sharp';

import { ParallelEdgeProcessor } from './parallel-edge.processor.js';
import { ReferenceEdgeProcessor } from './reference-edge.processor.js';
import { BandWorkerPool } from './worker-pool.js';
import { RawImage } from '../utils/raw-image.js';
import { ProcessingError } from '../utils/errors.js';
import { decodeImage, type DecodedImage } from '../utils/image-utils.js';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

/** Deterministic RGB noise with a bright diagonal stripe */
function testPixels(width: number, height: number): Buffer {
  const pixels = Buffer.alloc(width * height * 3);
  let state = 12345;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = (y * width + x) * 3;
      for (let c = 0; c < 3; c++) {
        state = (state * 48271) % 2147483647;
        pixels[p + c] = Math.abs(x - y) < 3 ? 250 : state % 120;
      }
    }
  }
  return pixels;
}

async function testPng(width: number, height: number): Promise<Buffer> {
  return sharp(testPixels(width, height), { raw: { width, height, channels: 3 } }).png().toBuffer();
}

describe('edge processors', () => {
  const reference = new ReferenceEdgeProcessor();
  const parallel = new ParallelEdgeProcessor({ workerCount: 3 });
  let png: Buffer;
  let decoded: DecodedImage;

  beforeAll(async () => {
    png = await testPng(64, 47);
    decoded = await decodeImage(png);
  });

  afterAll(async () => {
    await parallel.close();
    await reference.close();
  });

  it('should report their processing paths', () => {
    expect(reference.path).toBe('reference');
    expect(parallel.path).toBe('fast');
    expect(parallel.workerCount).toBe(3);
  });

  it('should produce pixel-identical edge magnitudes', async () => {
    const [fromParallel, fromReference] = await Promise.all([
      parallel.computeEdges(decoded),
      reference.computeEdges(decoded),
    ]);

    expect(fromParallel.length).toBe(64 * 47);
    expect(fromParallel).toEqual(fromReference);
  });

  it('should match the reference for band counts that do not divide the height', async () => {
    const sevenWay = new ParallelEdgeProcessor({ workerCount: 7 });
    try {
      expect(await sevenWay.computeEdges(decoded)).toEqual(await reference.computeEdges(decoded));
    } finally {
      await sevenWay.close();
    }
  });

  it('should leave the border of the edge plane black', async () => {
    const edges = await parallel.computeEdges(decoded);

    for (let x = 0; x < 64; x++) {
      expect(edges[x]).toBe(0);
      expect(edges[46 * 64 + x]).toBe(0);
    }
  });

  it('should encode identical JPEG output on both paths', async () => {
    const image = new RawImage(png);

    const [fast, slow] = await Promise.all([parallel.process(image), reference.process(image)]);

    expect(fast.degraded).toBe(false);
    expect(slow.degraded).toBe(false);
    expect(fast.data.equals(slow.data)).toBe(true);
    expect(fast.durationNanos).toBeGreaterThan(0);

    const metadata = await sharp(fast.data).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(64);
    expect(metadata.height).toBe(47);
  });

  it('should hand the image reference back when done', async () => {
    const image = new RawImage(png);

    await reference.process(image);
    await parallel.process(image);

    expect(image.refCount).toBe(1);
    expect(image.isReleased).toBe(false);
  });

  it('should pass undecodable input through unchanged', async () => {
    const garbage = Buffer.from('definitely not an image');
    const image = new RawImage(garbage);

    const [fast, slow] = await Promise.all([parallel.process(image), reference.process(image)]);

    expect(fast.degraded).toBe(true);
    expect(fast.data).toBe(garbage);
    expect(slow.degraded).toBe(true);
    expect(slow.data).toBe(garbage);
    expect(image.refCount).toBe(1);
  });

  it('should pass an empty payload through unchanged', async () => {
    const output = await reference.process(new RawImage(Buffer.alloc(0)));

    expect(output.degraded).toBe(true);
    expect(output.data.length).toBe(0);
  });

  it('should fail with ProcessingError once its worker pool is closed', async () => {
    const pool = new BandWorkerPool({ size: 2 });
    const processor = new ParallelEdgeProcessor({ pool });
    await processor.close();

    const image = new RawImage(png);
    const error = await processor.process(image).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProcessingError);
    expect(error).toHaveProperty('processor', 'fast');
    expect(pool.isClosed).toBe(true);
    expect(image.refCount).toBe(1);
  });

  it('should report reference pool failures against the reference path', async () => {
    const processor = new ReferenceEdgeProcessor();
    await processor.close();

    const error = await processor.process(new RawImage(png)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProcessingError);
    expect(error).toHaveProperty('processor', 'reference');
  });

  it('should keep the event loop free while the reference passes run', async () => {
    const image: DecodedImage = { data: testPixels(400, 300), width: 400, height: 300, channels: 3 };
    let immediateRan = false;
    setImmediate(() => {
      immediateRan = true;
    });

    const edges = await reference.computeEdges(image);

    expect(immediateRan).toBe(true);
    expect(edges.length).toBe(400 * 300);
  });
});
