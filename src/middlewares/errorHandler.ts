import { Request, Response, NextFunction } from 'express';
import { AppError } from '@/errors';
import { ErrorEnvelope } from '@/models';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Build the response body for an error
 * `ticker` is included whenever the failing request named one.
 */
export function toErrorEnvelope(err: AppError): ErrorEnvelope {
  return err.ticker !== undefined
    ? { ticker: err.ticker, success: false, error: err.message }
    : { success: false, error: err.message };
}

/**
 * Global error handler middleware
 *
 * Every upstream failure reaches this point as an UpstreamRetrievalError and
 * leaves as HTTP 500 with the exception's own message. Unknown errors are
 * not echoed to the caller.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const ticker = err instanceof AppError ? err.ticker : undefined;

  logger.error(
    {
      ticker,
      error: {
        name: err.name,
        message: err.message,
        stack: err.stack,
      },
      request: {
        method: req.method,
        url: req.originalUrl,
      },
    },
    ticker !== undefined ? `Error serving ${ticker}: ${err.message}` : 'Error occurred'
  );

  if (err instanceof AppError) {
    res.status(err.statusCode).json(toErrorEnvelope(err));
    return;
  }

  const body: ErrorEnvelope = { success: false, error: 'Internal server error' };
  res.status(500).json(body);
}
