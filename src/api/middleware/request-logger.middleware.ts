import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from '@/logging/index.js';
import { getCorrelationId } from './correlation.middleware.js';

/**
 * Request log entry structure
 */
export interface RequestLogEntry {
  correlationId: string;
  method: string;
  path: string;
  statusCode: number;
  duration: number;
}

export interface RequestLoggerOptions {
  /** Paths logged at debug level only, e.g. orchestrator probes polled every few seconds */
  quietPaths?: readonly string[];
}

/**
 * Request logging middleware
 *
 * Logs method, path, status code, duration and correlation ID once the
 * response has been sent. The path excludes the query string.
 *
 * Must be applied after correlationMiddleware.
 */
export function createRequestLoggerMiddleware(
  logger: Logger,
  options: RequestLoggerOptions = {}
): RequestHandler {
  const quietPaths = new Set(options.quietPaths ?? []);

  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    // Mounted routers strip their prefix from req.path; take the full path now
    const path = req.originalUrl.split('?')[0];

    res.on('finish', () => {
      const entry: RequestLogEntry = {
        correlationId: getCorrelationId(req),
        method: req.method,
        path,
        statusCode: res.statusCode,
        duration: Date.now() - startTime
      };

      const message = `${entry.method} ${entry.path} ${entry.statusCode}`;
      if (quietPaths.has(entry.path)) {
        logger.debug(message, { ...entry });
      } else if (entry.statusCode >= 500) {
        logger.error(message, { ...entry });
      } else {
        logger.info(message, { ...entry });
      }
    });

    next();
  };
}
