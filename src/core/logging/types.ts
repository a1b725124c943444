/**
 * Logger interface used by every component of the ingress compiler.
 *
 * The builder takes one of these as a collaborator, so callers can hand in
 * their own implementation (tests pass a recording fake).
 */
export interface IngressLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log debug level messages
   */
  debug(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log informational messages
   */
  info(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log warning messages
   */
  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Log fatal error messages (most severe)
   */
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): IngressLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Configuration options for the pino-backed logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false in production)
   */
  pretty?: boolean;

  /**
   * Output destination (default: stdout)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}

/**
 * Context bound onto child loggers
 */
export interface LoggerContext {
  component?: string;
  builder?: string;
  route?: string;
  [key: string]: unknown;
}
