import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from '@/app.js';
import { ConfigurationError, loadSettings } from '@/config/settings.js';
import { Logger } from '@/logging/index.js';
import { PostgresClient } from '@/lib/database/postgres.client.js';
import { RedisCacheClient } from '@/lib/cache/redis.client.js';
import {
  HealthReporter,
  createCacheProbe,
  createDatabaseProbe,
  createEventLoopProbe
} from '@/health/index.js';

/**
 * Invalid configuration is fatal: the process exits before listening
 */
function loadConfiguration(): ReturnType<typeof loadSettings> {
  try {
    return loadSettings(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[Startup] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Start the API server
 */
async function start(): Promise<void> {
  const { settings, warnings } = loadConfiguration();
  const logger = new Logger({ level: settings.logLevel, format: settings.logFormat });
  const startupLogger = logger.child('Startup');

  for (const warning of warnings) {
    startupLogger.warn(warning);
  }

  startupLogger.info('Starting API', {
    name: settings.appName,
    version: settings.appVersion,
    environment: settings.environment
  });

  const database = PostgresClient.create({
    connectionString: settings.databaseUrl,
    poolSize: settings.databasePoolSize,
    connectionTimeoutMs: settings.health.probeTimeoutMs,
    logger: logger.child('Database')
  });
  const cache = RedisCacheClient.create({
    url: settings.redisUrl,
    connectTimeoutMs: settings.health.probeTimeoutMs,
    logger: logger.child('Cache')
  });

  const reporter = new HealthReporter(
    [createDatabaseProbe(database), createCacheProbe(cache), createEventLoopProbe()],
    {
      timeoutMs: settings.health.probeTimeoutMs,
      degradedThresholdMs: settings.health.degradedThresholdMs,
      version: settings.appVersion,
      environment: settings.environment
    },
    { logger: logger.child('Health') }
  );
  startupLogger.info('Health checks configured', { ...reporter.getConfig() });

  const app = createApp({ settings, logger, reporter });

  const server: Server = app.listen(settings.port, settings.host, () => {
    startupLogger.info('API listening', { host: settings.host, port: settings.port });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    startupLogger.info('Shutting down', { signal });

    server.close(() => {
      Promise.allSettled([database.close(), cache.close()])
        .then((results) => {
          for (const result of results) {
            if (result.status === 'rejected') {
              startupLogger.error('Failed to close client', { error: result.reason });
            }
          }
          process.exit(0);
        })
        .catch((error: unknown) => {
          startupLogger.error('Shutdown failed', { error });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  console.error('[Startup] Fatal error during startup:', error);
  process.exit(1);
});
