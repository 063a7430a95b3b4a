import { ILogger, LogLevel, LogMetadata } from '../../types/logger';

/**
 * Base class for logger adapters.
 * Concrete adapters only decide where a formatted line goes.
 */
export abstract class LoggerAdapter implements ILogger {
  protected level: LogLevel = LogLevel.INFO;

  /**
   * Sets logging level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Checks if specified logging level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Logs message with specified level
   * This method must be implemented in concrete adapters
   */
  abstract log(level: LogLevel, message: string, ...args: readonly unknown[]): void;

  debug(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  fatal(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.FATAL, message, ...args);
  }

  /**
   * Logs event with metadata
   * @param category Event category (e.g., 'node', 'pipeline')
   * @param eventName Event name
   * @param metadata Additional metadata
   * @param level Level the event is logged at
   */
  logEvent(
    category: string,
    eventName: string,
    metadata?: LogMetadata,
    level: LogLevel = LogLevel.INFO
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    let message = `[EVENT][${category}][${eventName}]`;

    if (metadata) {
      try {
        message += ` ${JSON.stringify(metadata)}`;
      } catch (error) {
        message += ` (metadata serialization error: ${
          error instanceof Error ? error.message : String(error)
        })`;
      }
    }

    this.log(level, message);
  }

  /**
   * Measures operation execution time and logs result
   * @param category Operation category
   * @param operation Operation name
   * @param action Function to execute
   * @param metadata Extra metadata logged with the duration
   * @returns Function execution result
   */
  measureTime<T>(
    category: string,
    operation: string,
    action: () => T,
    metadata: LogMetadata = {}
  ): T {
    const start = performance.now();
    try {
      const result = action();
      const duration = performance.now() - start;
      this.logEvent(category, operation, { ...metadata, duration: `${duration.toFixed(1)}ms` });
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.logEvent(
        category,
        `${operation}:error`,
        {
          ...metadata,
          duration: `${duration.toFixed(1)}ms`,
          error: error instanceof Error ? error.message : String(error),
        },
        LogLevel.ERROR
      );
      throw error;
    }
  }
}
