import { LOG_LEVELS, LoggerProvider, LogLevel } from "./LoggerProvider.js";

const PREFIX = "[plugin-catalog]";

/**
 * Default LoggerProvider writing to the Node.js console.
 *
 * Messages below the configured level are dropped; `silent` drops all.
 */
export class ConsoleLogger implements LoggerProvider {
  constructor(private readonly level: LogLevel = "info") {}

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(...args: unknown[]) {
    if (this.enabled("debug")) console.debug(`${PREFIX}[debug]`, ...args);
  }

  info(...args: unknown[]) {
    if (this.enabled("info")) console.info(PREFIX, ...args);
  }

  /**
   * Warnings and errors go to stderr.
   */
  warn(...args: unknown[]) {
    if (this.enabled("warn")) console.warn(`${PREFIX}[warn]`, ...args);
  }

  error(...args: unknown[]) {
    if (this.enabled("error")) console.error(`${PREFIX}[error]`, ...args);
  }
}
