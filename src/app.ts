import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { isProduction, type Settings } from '@/config/settings.js';
import type { Logger } from '@/logging/index.js';
import { ApiError, createErrorHandler, notFoundHandler } from '@/api/middleware/error.handler.js';
import { correlationMiddleware } from '@/api/middleware/correlation.middleware.js';
import { createRequestLoggerMiddleware } from '@/api/middleware/request-logger.middleware.js';
import { createHealthRouter, type HealthReporter } from '@/health/index.js';

export interface AppDependencies {
  settings: Readonly<Settings>;
  logger: Logger;
  reporter: HealthReporter;
}

/**
 * Build the Express application
 *
 * Middleware order: security headers, body parsing, CORS, correlation ID,
 * request logging, routes, 404, error handler.
 */
export function createApp({ settings, logger, reporter }: AppDependencies): express.Express {
  const app = express();
  const allowedOrigins = new Set(settings.allowedOrigins);

  app.disable('x-powered-by');

  app.use(helmet({
    hsts: isProduction(settings),
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"]
      }
    }
  }));
  app.use(express.json());
  app.use(cors({
    origin: (origin, callback) => {
      // Requests with no origin (curl, orchestrator probes) are allowed
      if (!origin || allowedOrigins.has('*') || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      callback(ApiError.originNotAllowed());
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS']
  }));

  app.use(correlationMiddleware);
  app.use(createRequestLoggerMiddleware(logger.child('Request'), {
    quietPaths: ['/health/liveness', '/health/readiness']
  }));

  app.get('/', (_req, res) => {
    res.json({
      message: `Welcome to ${settings.appName}`,
      version: settings.appVersion,
      environment: settings.environment
    });
  });

  app.use('/health', createHealthRouter(reporter, {
    detailedRateLimitPerMinute: settings.health.detailedRateLimitPerMinute
  }));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger.child('Error')));

  return app;
}
