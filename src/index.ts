export { PipelineOrchestrator, createPipeline } from './services/pipeline.service.js';
export type { ImageSource, PipelineOrchestratorOptions } from './services/pipeline.service.js';
export { MetricsCollector } from './services/metrics.service.js';
export type { MetricsCollectorOptions } from './services/metrics.service.js';
export { ImageFetcher, HttpConnection, nodeHttpTransport } from './services/image-fetcher.service.js';
export type {
  FetchResult,
  FetchSource,
  HttpResponse,
  HttpTransport,
  ImageFetcherOptions,
} from './services/image-fetcher.service.js';
export { ConnectionPool } from './services/connection-pool.js';
export type { ConnectionPoolOptions, PoolFactory, PoolLease, PoolStats } from './services/connection-pool.js';
export { RegionDetector } from './services/region-detector.service.js';
export type { RegionDetectorOptions } from './services/region-detector.service.js';
export { FlareMonitor } from './services/flare-monitor.service.js';
export type { FlareMonitorOptions, FlareReport, ResultStream } from './services/flare-monitor.service.js';

export { ParallelEdgeProcessor } from './processors/parallel-edge.processor.js';
export type { ParallelEdgeProcessorOptions } from './processors/parallel-edge.processor.js';
export { ReferenceEdgeProcessor } from './processors/reference-edge.processor.js';
export type { ReferenceEdgeProcessorOptions } from './processors/reference-edge.processor.js';
export { BandWorkerPool } from './processors/worker-pool.js';
export type { EdgeProcessor, EdgeProcessorOptions, ProcessorOutput } from './processors/types.js';

export { ResultBroadcaster } from './utils/broadcast.js';
export type { ResultBroadcasterOptions, ResultSubscription } from './utils/broadcast.js';
export { RawImage } from './utils/raw-image.js';
export { mergeResults, speedupOf, primaryOutput } from './utils/processed-result.js';
export {
  AppError,
  DownloadError,
  DecodeError,
  ProcessingError,
  PoolExhaustedError,
  PoolClosedError,
  ResourceReleasedError,
  PipelineStateError,
  ValidationError,
} from './utils/errors.js';
export type { DownloadFailureReason, FetchAttempt } from './utils/errors.js';

export { buildConfig, getConfig, parseEnv } from './config/index.js';
export type { AppConfig, Env } from './config/index.js';

export type {
  FlareEvent,
  MetricsSnapshot,
  PartialResult,
  PipelineState,
  ProcessedResult,
  ProcessingPath,
} from './types/pipeline.types.js';
