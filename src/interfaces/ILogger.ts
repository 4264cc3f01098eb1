/**
 * Logger Interface
 *
 * Abstraction for logging across the application.
 * Services depend on this interface, never on pino directly.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following common logging patterns (pino, winston, etc.)
 */
export interface ILogger {
  /**
   * Debug level - Detailed diagnostic information
   * Example: "Command dispatched", "Demo seed loaded"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Normal operations and ledger events
   * Example: "Deposit recorded", "Account opened"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Rejected operations
   * Example: "Withdrawal rejected: insufficient funds"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * Create a logger instance
   * @param context - Optional context name for logger (e.g., "LedgerService", "cli")
   */
  createLogger(context?: string): ILogger;
}
