import type { Request, Response, NextFunction } from 'express';
import type { Logger } from '@/logging/index.js';
import { getCorrelationId } from './correlation.middleware.js';

/**
 * API error codes for centralized error handling
 */
export enum ApiErrorCode {
  BAD_REQUEST = 'BAD_REQUEST',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * Standard API error class
 */
export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        retryable: this.retryable,
        ...(this.details && { details: this.details })
      }
    };
  }

  static notFound(method: string, path: string): ApiError {
    return new ApiError(ApiErrorCode.NOT_FOUND, `Cannot ${method} ${path}`, 404, false);
  }

  static rateLimited(): ApiError {
    return new ApiError(
      ApiErrorCode.RATE_LIMITED,
      'Too many requests. Please try again later.',
      429,
      true
    );
  }

  /**
   * Origin rejected by the CORS allow-list
   */
  static originNotAllowed(): ApiError {
    return new ApiError(ApiErrorCode.FORBIDDEN, 'Origin not allowed', 403, false);
  }

  static internal(message: string = 'Internal server error'): ApiError {
    return new ApiError(ApiErrorCode.INTERNAL_ERROR, message, 500, false);
  }
}

/**
 * Body-parser and similar http-errors carry a 4xx status
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const status = err.status;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return status;
    }
  }
  return undefined;
}

/**
 * Normalize any thrown value into an ApiError
 */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    return new ApiError(
      ApiErrorCode.BAD_REQUEST,
      err instanceof Error ? err.message : 'Bad request',
      status,
      false
    );
  }

  // Internal error messages are not echoed to clients
  return ApiError.internal();
}

/**
 * 404 handler, mounted after every route
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error = ApiError.notFound(req.method, req.path);
  res.status(error.statusCode).json(error.toJSON());
}

/**
 * Terminal error middleware
 * Logs the original error and renders the standard envelope
 */
export function createErrorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const apiError = toApiError(err);

    const fields = {
      correlationId: getCorrelationId(req),
      method: req.method,
      path: req.path,
      code: apiError.code,
      ...(err instanceof Error && { error: err, stack: err.stack })
    };

    if (apiError.statusCode >= 500) {
      logger.error('Request failed', fields);
    } else {
      logger.warn('Request rejected', fields);
    }

    res.status(apiError.statusCode).json(apiError.toJSON());
  };
}
