import { NextFunction, Request, Response } from 'express';
import {
  ConflictError, DataIntegrityError, GenerationError, NotFoundError, ProviderError, ValidationError
} from '../models/errors';

interface ErrorResponse {
  status: number;
  error: string;
}

/**
 * Map the error taxonomy to an HTTP status and a short label
 */
export function describeError(error: unknown): ErrorResponse {
  if (error instanceof GenerationError) return { status: 502, error: 'Invalid model output' };
  if (error instanceof ValidationError) return { status: 400, error: 'Validation failed' };
  if (error instanceof NotFoundError) return { status: 404, error: 'Not Found' };
  if (error instanceof ConflictError) return { status: 409, error: 'Conflict' };
  if (error instanceof ProviderError) return { status: 502, error: 'Provider error' };
  if (error instanceof DataIntegrityError) return { status: 500, error: 'Data integrity error' };
  // express.json() rejects malformed bodies with a SyntaxError
  if (error instanceof SyntaxError) return { status: 400, error: 'Invalid JSON' };
  return { status: 500, error: 'Internal server error' };
}

/**
 * Write an error response; unexpected errors are logged and their message hidden
 */
export function sendError(res: Response, error: unknown, context: string): void {
  const { status, error: label } = describeError(error);

  if (status >= 500) {
    console.error(`❌ ${context}:`, error);
  }

  const body: { error: string; message: string; details?: string[] } = {
    error: label,
    message: label === 'Internal server error' || !(error instanceof Error)
      ? context
      : error.message
  };
  if (error instanceof ValidationError && error.details.length > 0) {
    body.details = error.details.map(detail => detail.message);
  }

  res.status(status).json(body);
}

/**
 * Express error middleware for anything a handler did not answer itself
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  sendError(res, error, `Unhandled error on ${req.method} ${req.originalUrl}`);
}
