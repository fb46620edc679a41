import { z } from 'zod';

const DEFAULT_PRIMARY_URL = 'https://sohowww.nascom.nasa.gov/data/realtime/eit_195/1024/latest.jpg';
const DEFAULT_FALLBACK_URL = 'https://soho.nascom.nasa.gov/data/realtime/eit_195/1024/latest.jpg';

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Image sources
  PRIMARY_IMAGE_URL: z.string().url().default(DEFAULT_PRIMARY_URL),
  FALLBACK_IMAGE_URL: z.string().url().default(DEFAULT_FALLBACK_URL),

  // Scheduling
  PIPELINE_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FRAME_LOG_INTERVAL: z.coerce.number().int().positive().default(10),

  // HTTP connection pool
  HTTP_POOL_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  HTTP_POOL_MAX_IDLE_MS: z.coerce.number().int().positive().default(30000), // 30 seconds
  HTTP_POOL_MAX_LIFETIME_MS: z.coerce.number().int().positive().default(300000), // 5 minutes
  HTTP_POOL_PENDING_ACQUIRE_MAX: z.coerce.number().int().nonnegative().default(50),
  HTTP_POOL_EVICTION_INTERVAL_MS: z.coerce.number().int().positive().default(60000), // 1 minute

  // Processing
  EDGE_WORKER_COUNT: z.coerce.number().int().nonnegative().default(0), // 0 = hardware parallelism
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(90),

  // Streaming
  SUBSCRIBER_BUFFER_SIZE: z.coerce.number().int().positive().default(16),

  // Flare detection
  FLARE_BRIGHTNESS_THRESHOLD: z.coerce.number().int().min(0).max(255).default(200),
  FLARE_MIN_REGION_SIZE: z.coerce.number().int().positive().default(100),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
