/**
 * Error Handler Middleware
 * API error type, async route wrapper and the final Express error handler
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '../config/env';
import { UnsupportedFieldTypeError } from '../lib/fields/field.errors';

export class ApiError extends Error {
  statusCode: number;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

interface ErrorResponse {
  success: false;
  error: string;
  details?: unknown;
  stack?: string;
}

/**
 * Wrap an async route so rejections reach the error handler
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof UnsupportedFieldTypeError) {
    return new ApiError(400, error.message);
  }
  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    return new ApiError(400, 'Invalid JSON body');
  }
  if (error instanceof Error && 'type' in error && error.type === 'entity.too.large') {
    return new ApiError(413, 'Request body too large');
  }
  return new ApiError(500, 'Internal server error');
}

/**
 * Render errors as `{ success: false, error }`
 */
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express detects error handlers by arity
  _next: NextFunction
): void => {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
  }

  const body: ErrorResponse = {
    success: false,
    error: apiError.message,
  };
  if (apiError.details !== undefined) {
    body.details = apiError.details;
  }
  if (env.NODE_ENV === 'development' && error instanceof Error && apiError.statusCode >= 500) {
    body.stack = error.stack;
  }

  res.status(apiError.statusCode).json(body);
};
