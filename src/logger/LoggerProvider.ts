export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

/**
 * LogLevel: Defines the supported log verbosity levels.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * LoggerProvider: Abstract interface for pluggable loggers.
 *
 * Used to provide custom logging behavior (e.g., console, file, test capture).
 */
export interface LoggerProvider {
  /**
   * Logs low-level debug information.
   *
   * @param args - Arbitrary arguments to log.
   */
  debug(...args: unknown[]): void;

  /**
   * Logs general informational messages.
   *
   * @param args - Arbitrary arguments to log.
   */
  info(...args: unknown[]): void;

  /**
   * Logs warnings (non-fatal issues).
   *
   * @param args - Arbitrary arguments to log.
   */
  warn(...args: unknown[]): void;

  /**
   * Logs errors or critical failures.
   *
   * @param args - Arbitrary arguments to log.
   */
  error(...args: unknown[]): void;
}
