import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { HealthReporter } from './services/health-reporter.service.js';

export interface HealthController {
  basic: RequestHandler;
  liveness: RequestHandler;
  readiness: RequestHandler;
  detailed: RequestHandler;
}

/**
 * Health endpoint handlers
 *
 * Status codes:
 * - basic, liveness, detailed: 200 whenever the process can answer
 * - readiness: 503 when a required dependency is unavailable, else 200
 */
export function createHealthController(reporter: HealthReporter): HealthController {
  return {
    basic(_req: Request, res: Response): void {
      res.status(200).json(reporter.basic());
    },

    liveness(_req: Request, res: Response): void {
      res.status(200).json(reporter.liveness());
    },

    async readiness(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const readiness = await reporter.readiness();
        res.status(readiness.ready ? 200 : 503).json(readiness);
      } catch (error) {
        next(error);
      }
    },

    async detailed(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        res.status(200).json(await reporter.detailed());
      } catch (error) {
        next(error);
      }
    }
  };
}
