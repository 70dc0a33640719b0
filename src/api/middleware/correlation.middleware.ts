import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

/**
 * Extend Express Request to include correlation ID
 */
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export const CORRELATION_HEADER = 'x-request-id';

/**
 * Upper bound on accepted inbound IDs; longer values are replaced
 */
const MAX_CORRELATION_ID_LENGTH = 128;

/**
 * Extract correlation ID from request headers
 * Returns null when absent, empty, or longer than the accepted bound
 */
function extractCorrelationId(req: Request): string | null {
  const headerValue = req.headers[CORRELATION_HEADER];
  const candidate = Array.isArray(headerValue) ? headerValue[0] : headerValue;

  if (typeof candidate !== 'string') {
    return null;
  }

  const trimmed = candidate.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_CORRELATION_ID_LENGTH) {
    return null;
  }

  return trimmed;
}

/**
 * Middleware to manage correlation IDs for request tracking
 *
 * Reuses an inbound x-request-id header or generates a UUID v4, stores it on
 * the request, and echoes it on the response.
 */
export function correlationMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const correlationId = extractCorrelationId(req) ?? randomUUID();

  req.correlationId = correlationId;
  req.headers[CORRELATION_HEADER] = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  next();
}

/**
 * Correlation ID of the request, or 'unknown' if the middleware has not run
 */
export function getCorrelationId(req: Request): string {
  return req.correlationId || 'unknown';
}
