/**
 * Health Routes
 *
 * GET /health           - Basic health (version, uptime), no dependency calls
 * GET /health/liveness  - Process liveness, no dependency calls
 * GET /health/readiness - Required dependencies, 503 when one is unavailable
 * GET /health/detailed  - Every probe with latency, always 200, rate limited
 */

import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { ApiError } from '@/api/middleware/error.handler.js';
import { createHealthController } from './health.controller.js';
import type { HealthReporter } from './services/health-reporter.service.js';

export interface HealthRouterOptions {
  /** Requests per minute per client IP on the detailed endpoint */
  detailedRateLimitPerMinute: number;
}

export function createHealthRouter(reporter: HealthReporter, options: HealthRouterOptions): Router {
  const router = Router();
  const controller = createHealthController(reporter);

  // Detailed health hits every dependency; orchestrator probes are left unlimited
  const detailedLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: options.detailedRateLimitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      const error = ApiError.rateLimited();
      res.status(error.statusCode).json(error.toJSON());
    }
  });

  router.get('/', controller.basic);
  router.get('/liveness', controller.liveness);
  router.get('/readiness', controller.readiness);
  router.get('/detailed', detailedLimiter, controller.detailed);

  return router;
}
