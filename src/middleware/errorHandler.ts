import { Request, Response, NextFunction } from 'express';
import { AgentResponseError, LlmRequestError, WebSearchError } from '../services/errors.js';

/**
 * Custom error class with status code
 */
export class HttpError extends Error {
  constructor(
    public status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * Status code for an error reaching the handler.
 * Upstream model/search failures are gateway errors.
 */
function statusFor(err: Error): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof LlmRequestError || err instanceof AgentResponseError || err instanceof WebSearchError) {
    return 502;
  }
  // ConfigurationError and anything else is our own fault
  return 500;
}

const ERROR_LABELS: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  502: 'Bad Gateway',
};

/**
 * Centralized error handler middleware.
 * Should be registered last after all routes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error(`[Error] ${req.method} ${req.path}:`, err.message);

  const status = statusFor(err);

  if (res.headersSent) {
    res.end();
    return;
  }

  res.status(status).json({
    error: ERROR_LABELS[status] ?? (status >= 500 ? 'Internal Server Error' : 'Error'),
    message: err.message || 'An unexpected error occurred',
  });
}
