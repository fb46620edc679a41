import { describe, it, expect, vi, beforeAll, beforeEach, afterAll, afterEach } from 'vitest';
import http from 'http';
import sharp from 'sharp';

import {
  PipelineOrchestrator,
  createPipeline,
  type ImageSource,
  type PipelineOrchestratorOptions,
} from './pipeline.service.js';
import { buildConfig } from '../config/index.js';
import { envSchema } from '../config/env.js';
import type { FetchResult } from './image-fetcher.service.js';
import { MetricsCollector } from './metrics.service.js';
import { RawImage } from '../utils/raw-image.js';
import { DownloadError, PipelineStateError, ProcessingError } from '../utils/errors.js';
import type { EdgeProcessor, ProcessorOutput } from '../processors/types.js';
import type { ProcessedResult, ProcessingPath } from '../types/pipeline.types.js';

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => mockLogger),
}));

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

class FakeSource implements ImageSource {
  readonly images: RawImage[] = [];
  private count = 0;

  fetch = vi.fn(async (_primaryUrl?: string, _signal?: AbortSignal): Promise<FetchResult> => {
    const image = new RawImage(Buffer.from(`frame-${++this.count}`));
    this.images.push(image);
    return { ok: true, image, source: 'primary' };
  });

  close = vi.fn(async () => {});
}

/** Prefixes the input bytes with its path name and reports a fixed duration */
class FakeProcessor implements EdgeProcessor {
  constructor(
    readonly path: ProcessingPath,
    private readonly durationNanos: number
  ) {}

  process = vi.fn(async (image: RawImage): Promise<ProcessorOutput> => {
    image.retain();
    try {
      return {
        data: Buffer.concat([Buffer.from(`${this.path}:`), image.bytes]),
        durationNanos: this.durationNanos,
        degraded: false,
      };
    } finally {
      image.release();
    }
  });

  computeEdges = vi.fn(async () => new Uint8Array(0));

  close = vi.fn(async () => {});
}

async function nextResult(stream: AsyncIterableIterator<ProcessedResult>): Promise<ProcessedResult> {
  const next = await stream.next();
  if (next.done) throw new Error('Stream ended');
  return next.value;
}

describe('PipelineOrchestrator', () => {
  let source: FakeSource;
  let fast: FakeProcessor;
  let reference: FakeProcessor;
  let pipeline: PipelineOrchestrator;

  function createOrchestrator(options: Partial<PipelineOrchestratorOptions> = {}): PipelineOrchestrator {
    pipeline = new PipelineOrchestrator({
      source,
      fastProcessor: fast,
      referenceProcessor: reference,
      intervalMs: 60_000,
      ...options,
    });
    return pipeline;
  }

  beforeEach(() => {
    source = new FakeSource();
    fast = new FakeProcessor('fast', 1_000_000);
    reference = new FakeProcessor('reference', 4_000_000);
    vi.clearAllMocks();
  });

  afterEach(async () => {
    await pipeline.stop();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('should publish the first merged frame immediately', async () => {
      createOrchestrator();
      const stream = pipeline.subscribe();

      pipeline.start();
      const result = await nextResult(stream);

      expect(pipeline.state).toBe('running');
      expect(result.fastOutput?.toString()).toBe('fast:frame-1');
      expect(result.referenceOutput?.toString()).toBe('reference:frame-1');
      expect(result.fastDurationNanos).toBe(1_000_000);
      expect(result.referenceDurationNanos).toBe(4_000_000);
      expect(result.originalSizeBytes).toBe(7);
      expect(Object.isFrozen(result)).toBe(true);
      expect(pipeline.frameCount()).toBe(1);
    });

    it('should be a no-op while already running', async () => {
      createOrchestrator();
      const stream = pipeline.subscribe();

      pipeline.start();
      pipeline.start();
      await nextResult(stream);

      expect(source.fetch).toHaveBeenCalledTimes(1);
    });

    it('should refuse to restart after stop', async () => {
      createOrchestrator();
      pipeline.start();
      await pipeline.stop();

      expect(() => pipeline.start()).toThrow(PipelineStateError);
      expect(pipeline.state).toBe('stopped');
    });

    it('should tick on the configured interval', async () => {
      vi.useFakeTimers();
      createOrchestrator({ intervalMs: 1000 });
      const stream = pipeline.subscribe();

      pipeline.start();
      await nextResult(stream);
      await vi.advanceTimersByTimeAsync(1000);
      const second = await nextResult(stream);

      expect(second.fastOutput?.toString()).toBe('fast:frame-2');
      expect(source.fetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('stream', () => {
    it('should share each result between subscribers without extra fetches', async () => {
      createOrchestrator();
      const first = pipeline.subscribe();
      const second = pipeline.subscribe();

      pipeline.start();
      const [a, b] = await Promise.all([nextResult(first), nextResult(second)]);

      expect(a).toBe(b);
      expect(source.fetch).toHaveBeenCalledTimes(1);
      expect(fast.process).toHaveBeenCalledTimes(1);
      expect(reference.process).toHaveBeenCalledTimes(1);
    });

    it('should give late subscribers only later results', async () => {
      vi.useFakeTimers();
      createOrchestrator({ intervalMs: 1000 });
      const early = pipeline.subscribe();

      pipeline.start();
      await nextResult(early);
      const late = pipeline.subscribe();
      await vi.advanceTimersByTimeAsync(1000);

      expect((await nextResult(late)).fastOutput?.toString()).toBe('fast:frame-2');
    });

    it('should publish in tick order when an earlier round is slower', async () => {
      vi.useFakeTimers();
      const slow = deferred<FetchResult>();
      source.fetch.mockImplementationOnce(() => slow.promise);
      createOrchestrator({ intervalMs: 100 });
      const stream = pipeline.subscribe();

      pipeline.start();
      await vi.advanceTimersByTimeAsync(100);

      expect(source.fetch).toHaveBeenCalledTimes(2);
      expect(fast.process).toHaveBeenCalledTimes(1);
      expect(pipeline.frameCount()).toBe(0);

      slow.resolve({ ok: true, image: new RawImage(Buffer.from('slow')), source: 'primary' });
      const first = await nextResult(stream);
      const second = await nextResult(stream);

      expect(first.fastOutput?.toString()).toBe('fast:slow');
      expect(second.fastOutput?.toString()).toBe('fast:frame-1');
      expect(pipeline.frameCount()).toBe(2);
    });

    it('should complete subscribers on stop', async () => {
      createOrchestrator();
      const stream = pipeline.subscribe();

      await pipeline.stop();

      expect(await stream.next()).toEqual({ done: true, value: undefined });
      expect(await pipeline.subscribe().next()).toEqual({ done: true, value: undefined });
    });
  });

  describe('failure containment', () => {
    it('should skip a round whose fetch fails and carry on', async () => {
      vi.useFakeTimers();
      source.fetch.mockResolvedValueOnce({ ok: false, error: new DownloadError('both down', 'status') });
      createOrchestrator({ intervalMs: 1000 });
      const stream = pipeline.subscribe();

      pipeline.start();
      await vi.advanceTimersByTimeAsync(1000);
      const result = await nextResult(stream);

      expect(result.fastOutput?.toString()).toBe('fast:frame-1');
      expect(pipeline.frameCount()).toBe(1);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { tick: 1, reason: 'status', error: 'both down' },
        'Image fetch failed, skipping round'
      );
    });

    it('should abandon a round when one processing path fails', async () => {
      vi.useFakeTimers();
      fast.process.mockRejectedValueOnce(new Error('worker crashed'));
      createOrchestrator({ intervalMs: 1000 });
      const stream = pipeline.subscribe();

      pipeline.start();
      await vi.advanceTimersByTimeAsync(1000);
      const result = await nextResult(stream);

      expect(result.fastOutput?.toString()).toBe('fast:frame-2');
      expect(pipeline.frameCount()).toBe(1);
      expect(reference.process).toHaveBeenCalledTimes(2);
      expect(source.images[0]?.isReleased).toBe(true);
      expect(mockLogger.error).toHaveBeenCalledWith(
        { tick: 1, error: 'fast: Processing path failed' },
        'Pipeline round failed'
      );
    });

    it('should keep ProcessingError messages from the processors', async () => {
      reference.process.mockRejectedValueOnce(new ProcessingError('Edge detection failed', 'reference'));
      createOrchestrator();

      pipeline.start();
      await vi.waitFor(() => expect(mockLogger.error).toHaveBeenCalled());

      expect(mockLogger.error).toHaveBeenCalledWith(
        { tick: 1, error: 'reference: Edge detection failed' },
        'Pipeline round failed'
      );
      expect(pipeline.frameCount()).toBe(0);
    });
  });

  describe('resources', () => {
    it('should release each image once both paths are done', async () => {
      createOrchestrator();
      const stream = pipeline.subscribe();

      pipeline.start();
      await nextResult(stream);

      expect(source.images[0]?.isReleased).toBe(true);
    });

    it('should record processing metrics for each published round', async () => {
      const metrics = new MetricsCollector();
      createOrchestrator({ metrics });
      const stream = pipeline.subscribe();

      pipeline.start();
      await nextResult(stream);
      const snapshot = pipeline.metricsSnapshot();

      expect(pipeline.metrics).toBe(metrics);
      expect(snapshot.totalFrames).toBe(1);
      expect(snapshot.fastProcessingNanos).toBe(1_000_000);
      expect(snapshot.referenceProcessingNanos).toBe(4_000_000);
      expect(snapshot.speedup).toBe(4);
    });

    it('should log progress every frameLogInterval frames', async () => {
      vi.useFakeTimers();
      createOrchestrator({ intervalMs: 1000, frameLogInterval: 2 });
      const stream = pipeline.subscribe();

      pipeline.start();
      await nextResult(stream);
      expect(mockLogger.info).not.toHaveBeenCalledWith(expect.objectContaining({ frame: 1 }), 'Pipeline progress');

      await vi.advanceTimersByTimeAsync(1000);
      await nextResult(stream);

      expect(mockLogger.info).toHaveBeenCalledWith(
        expect.objectContaining({ frame: 2, speedup: 4, lastSpeedup: 4 }),
        'Pipeline progress'
      );
    });
  });

  describe('stop', () => {
    it('should abort an in-flight fetch and publish nothing', async () => {
      source.fetch.mockImplementationOnce(
        (_url, signal) =>
          new Promise<FetchResult>((resolve) => {
            signal?.addEventListener('abort', () =>
              resolve({ ok: false, error: new DownloadError('Image fetch aborted', 'aborted') })
            );
          })
      );
      createOrchestrator();
      const stream = pipeline.subscribe();

      pipeline.start();
      await pipeline.stop();

      expect(source.fetch.mock.calls[0]?.[1]?.aborted).toBe(true);
      expect(await stream.next()).toEqual({ done: true, value: undefined });
      expect(pipeline.frameCount()).toBe(0);
      expect(mockLogger.warn).not.toHaveBeenCalled();
    });

    it('should wait for in-flight processing, then drop its result', async () => {
      const pending = deferred<ProcessorOutput>();
      fast.process.mockImplementationOnce(() => pending.promise);
      createOrchestrator();
      const stream = pipeline.subscribe();

      pipeline.start();
      await vi.waitFor(() => expect(fast.process).toHaveBeenCalledTimes(1));

      let stopped = false;
      const stopping = pipeline.stop().then(() => {
        stopped = true;
      });
      await Promise.resolve();
      expect(stopped).toBe(false);
      expect(pipeline.state).toBe('stopped');

      pending.resolve({ data: Buffer.from('late'), durationNanos: 1, degraded: false });
      await stopping;

      expect(await stream.next()).toEqual({ done: true, value: undefined });
      expect(pipeline.frameCount()).toBe(0);
      expect(pipeline.metricsSnapshot().totalFrames).toBe(0);
      expect(source.images[0]?.isReleased).toBe(true);
    });

    it('should not count a processed round that stop drops before publishing', async () => {
      vi.useFakeTimers();
      const slow = deferred<FetchResult>();
      source.fetch.mockImplementationOnce(() => slow.promise);
      createOrchestrator({ intervalMs: 100 });

      pipeline.start();
      await vi.advanceTimersByTimeAsync(100);
      expect(fast.process).toHaveBeenCalledTimes(1);

      const stopping = pipeline.stop();
      slow.resolve({ ok: true, image: new RawImage(Buffer.from('slow')), source: 'primary' });
      await stopping;

      const snapshot = pipeline.metricsSnapshot();
      expect(pipeline.frameCount()).toBe(0);
      expect(snapshot.totalFrames).toBe(0);
      expect(snapshot.fastProcessingNanos).toBe(0);
      expect(snapshot.referenceProcessingNanos).toBe(0);
    });

    it('should close the source and both processors exactly once', async () => {
      createOrchestrator();
      pipeline.start();

      await Promise.all([pipeline.stop(), pipeline.stop()]);
      await pipeline.stop();

      expect(source.close).toHaveBeenCalledTimes(1);
      expect(fast.close).toHaveBeenCalledTimes(1);
      expect(reference.close).toHaveBeenCalledTimes(1);
    });

    it('should stop ticking', async () => {
      vi.useFakeTimers();
      createOrchestrator({ intervalMs: 1000 });

      pipeline.start();
      await pipeline.stop();
      await vi.advanceTimersByTimeAsync(5000);

      expect(source.fetch).toHaveBeenCalledTimes(1);
    });

    it('should log and swallow resource close failures', async () => {
      source.close.mockRejectedValueOnce(new Error('pool already closed'));
      createOrchestrator();

      await expect(pipeline.stop()).resolves.toBeUndefined();
      expect(mockLogger.error).toHaveBeenCalledWith(
        { error: 'pool already closed' },
        'Failed to release pipeline resource'
      );
    });
  });
});

describe('createPipeline', () => {
  let server: http.Server;
  let baseUrl: string;
  let png: Buffer;
  let pipeline: PipelineOrchestrator | undefined;

  beforeAll(async () => {
    const pixels = Buffer.alloc(32 * 24 * 3);
    for (let index = 0; index < pixels.length; index += 3) {
      const x = (index / 3) % 32;
      pixels.fill(x < 16 ? 30 : 220, index, index + 3);
    }
    png = await sharp(pixels, { raw: { width: 32, height: 24, channels: 3 } }).png().toBuffer();

    server = http.createServer((req, res) => {
      if (req.url === '/latest.png') {
        res.writeHead(200, { 'content-type': 'image/png' });
        res.end(png);
        return;
      }
      res.writeHead(404);
      res.end();
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Test server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await pipeline?.stop();
    pipeline = undefined;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('should fetch, process and publish a frame from configuration', async () => {
    pipeline = createPipeline(
      buildConfig(
        envSchema.parse({
          NODE_ENV: 'test',
          PRIMARY_IMAGE_URL: `${baseUrl}/missing.png`,
          FALLBACK_IMAGE_URL: `${baseUrl}/latest.png`,
          PIPELINE_INTERVAL_MS: '60000',
          EDGE_WORKER_COUNT: '2',
        })
      )
    );
    const stream = pipeline.subscribe();

    pipeline.start();
    const result = await nextResult(stream);

    expect(result.originalSizeBytes).toBe(png.length);
    expect(result.fastOutput?.equals(result.referenceOutput ?? Buffer.alloc(0))).toBe(true);
    const metadata = await sharp(result.fastOutput).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(32);
    expect(metadata.height).toBe(24);

    const snapshot = pipeline.metricsSnapshot();
    expect(snapshot.totalDownloads).toBe(1);
    expect(snapshot.totalBytes).toBe(png.length);
    expect(snapshot.totalFrames).toBe(1);
    expect(pipeline.frameCount()).toBe(1);
  });
});

