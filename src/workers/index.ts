import 'dotenv/config';

import { parseEnv } from '../config/env.js';
import { getConfig } from '../config/index.js';
import { getLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';
import { createPipeline } from '../services/pipeline.service.js';
import { FlareMonitor } from '../services/flare-monitor.service.js';
import { RegionDetector } from '../services/region-detector.service.js';

/**
 * Runner entry point: periodic fetch, edge detection and flare monitoring
 * until SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  logger.info(
    {
      env: config.env,
      primaryUrl: config.sources.primaryUrl,
      fallbackUrl: config.sources.fallbackUrl,
      intervalMs: config.pipeline.intervalMs,
      workers: config.processing.workerCount,
    },
    'Starting edge pipeline'
  );

  const pipeline = createPipeline(config);
  const monitor = new FlareMonitor(pipeline.subscribe(), {
    detector: new RegionDetector(config.flares),
  });
  const monitoring = monitor.run();

  pipeline.start();

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await pipeline.stop();
      const frames = await monitoring;
      logger.info({ frames, metrics: pipeline.metricsSnapshot() }, 'Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error: toError(error).message }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  // Use stderr for fatal errors before/after logger availability
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exit(1);
});
