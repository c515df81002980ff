/**
 * Logger Interface
 *
 * Application code depends on this contract rather than on pino directly,
 * so services can be handed a named logger (or a silent one in tests).
 */

/**
 * Structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /**
   * Detailed diagnostic information
   * Example: "Chart window resolved"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Normal operations
   * Example: "Fetching fundamentals", "Fetched historical data"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Degraded but recoverable conditions
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Failed operations and caught exceptions
   * Example: "Error fetching quote"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Unrecoverable errors right before the process exits
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Creates logger instances scoped to a context name
 */
export interface ILoggerFactory {
  /**
   * @param context - Component name added to every entry (e.g. "QuoteService")
   */
  createLogger(context?: string): ILogger;
}
