/**
 * Structured logger used across kubeegg
 */
export interface KubeEggLogger {
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
  child(bindings: Record<string, unknown>): KubeEggLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Configuration options for the kubeegg logger
 */
export interface LoggerConfig {
  /**
   * Log level threshold. `silent` disables output entirely.
   */
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false)
   */
  pretty?: boolean;

  /**
   * Output destination file (default: stdout)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}
