/**
 * Error Handler Middleware
 *
 * Centralized error handling for the API.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

// =============================================================================
// ERROR TYPES
// =============================================================================

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 503, 'SERVICE_UNAVAILABLE', details);
  }
}

// =============================================================================
// ERROR RESPONSE TYPE
// =============================================================================

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

function requestIdOf(req: Request): string | undefined {
  const header = req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export interface ErrorHandlerOptions {
  /** Hide messages of unexpected errors from clients */
  hideInternalErrors: boolean;
}

export function createErrorHandler(options: ErrorHandlerOptions) {
  return function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
  ): void {
    console.error('API Error:', {
      name: err.name,
      message: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    });

    const requestId = requestIdOf(req);

    if (err instanceof ApiError) {
      res.status(err.statusCode).json({
        error: {
          message: err.message,
          code: err.code,
          details: err.details,
          requestId,
        },
      } satisfies ErrorResponse);
      return;
    }

    if (err instanceof ZodError) {
      res.status(422).json({
        error: {
          message: 'Validation error',
          code: 'VALIDATION_ERROR',
          details: { errors: err.issues },
          requestId,
        },
      } satisfies ErrorResponse);
      return;
    }

    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        error: {
          message: 'Malformed JSON body',
          code: 'BAD_REQUEST',
          requestId,
        },
      } satisfies ErrorResponse);
      return;
    }

    res.status(500).json({
      error: {
        message: options.hideInternalErrors ? 'Internal server error' : err.message,
        code: 'INTERNAL_ERROR',
        requestId,
      },
    } satisfies ErrorResponse);
  };
}

// =============================================================================
// NOT FOUND HANDLER
// =============================================================================

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: 'ROUTE_NOT_FOUND',
      requestId: requestIdOf(req),
    },
  } satisfies ErrorResponse);
}
