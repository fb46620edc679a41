import os from 'os';

import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  env: 'development' | 'production' | 'test';
  sources: {
    primaryUrl: string;
    fallbackUrl: string;
  };
  pipeline: {
    intervalMs: number;
    frameLogInterval: number;
  };
  fetch: {
    timeoutMs: number;
  };
  pool: {
    maxConnections: number;
    maxIdleMs: number;
    maxLifetimeMs: number;
    pendingAcquireMax: number;
    evictionIntervalMs: number;
  };
  processing: {
    workerCount: number;
    jpegQuality: number;
  };
  stream: {
    bufferSize: number;
  };
  flares: {
    brightnessThreshold: number;
    minRegionSize: number;
  };
  logging: {
    level: string;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    env: env.NODE_ENV,
    sources: {
      primaryUrl: env.PRIMARY_IMAGE_URL,
      fallbackUrl: env.FALLBACK_IMAGE_URL,
    },
    pipeline: {
      intervalMs: env.PIPELINE_INTERVAL_MS,
      frameLogInterval: env.FRAME_LOG_INTERVAL,
    },
    fetch: {
      timeoutMs: env.FETCH_TIMEOUT_MS,
    },
    pool: {
      maxConnections: env.HTTP_POOL_MAX_CONNECTIONS,
      maxIdleMs: env.HTTP_POOL_MAX_IDLE_MS,
      maxLifetimeMs: env.HTTP_POOL_MAX_LIFETIME_MS,
      pendingAcquireMax: env.HTTP_POOL_PENDING_ACQUIRE_MAX,
      evictionIntervalMs: env.HTTP_POOL_EVICTION_INTERVAL_MS,
    },
    processing: {
      workerCount: env.EDGE_WORKER_COUNT > 0 ? env.EDGE_WORKER_COUNT : os.availableParallelism(),
      jpegQuality: env.JPEG_QUALITY,
    },
    stream: {
      bufferSize: env.SUBSCRIBER_BUFFER_SIZE,
    },
    flares: {
      brightnessThreshold: env.FLARE_BRIGHTNESS_THRESHOLD,
      minRegionSize: env.FLARE_MIN_REGION_SIZE,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
