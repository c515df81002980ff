/**
 * Base class for errors that map onto an HTTP response
 *
 * `ticker` is set when the failing request named one, and is echoed back in
 * the error envelope.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly ticker?: string;

  constructor(message: string, statusCode = 500, ticker?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.ticker = ticker;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
