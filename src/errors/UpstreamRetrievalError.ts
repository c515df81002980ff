import { AppError } from './AppError';

/**
 * Upstream Retrieval Error (500 Internal Server Error)
 * The one failure kind of the gateway: network errors, unknown tickers,
 * empty or malformed upstream payloads and mapping failures all end here.
 */
export class UpstreamRetrievalError extends AppError {
  constructor(ticker: string, message: string, options?: ErrorOptions) {
    super(message, 500, ticker, options);
  }

  /**
   * Wrap anything thrown while serving `ticker`, keeping its message text
   */
  static from(ticker: string, cause: unknown): UpstreamRetrievalError {
    if (cause instanceof UpstreamRetrievalError) {
      return cause;
    }
    const message = cause instanceof Error ? cause.message : String(cause);
    return new UpstreamRetrievalError(ticker, message || 'Upstream retrieval failed', { cause });
  }
}
