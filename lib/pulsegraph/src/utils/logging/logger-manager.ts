import { ILogger, LogLevel } from '../../types/logger';
import { ConsoleLoggerAdapter } from './console-logger-adapter';

/**
 * Process-wide logger holder. Nodes and pipelines created without an explicit
 * logger resolve it from here when they log, so `setLogger` takes effect on
 * existing instances too.
 */
export class LoggerManager {
  private static instance: LoggerManager | undefined;
  private logger: ILogger;

  private constructor() {
    this.logger = new ConsoleLoggerAdapter();
    this.logger.setLevel(LogLevel.INFO);
  }

  /**
   * Get logger manager instance
   */
  public static getInstance(): LoggerManager {
    if (!LoggerManager.instance) {
      LoggerManager.instance = new LoggerManager();
    }
    return LoggerManager.instance;
  }

  /**
   * Set custom logger (IoC implementation)
   */
  public setLogger(logger: ILogger): void {
    this.logger = logger;
  }

  public getLogger(): ILogger {
    return this.logger;
  }

  /**
   * Enables logs with specified level (default INFO)
   */
  public static enableLogs(level: LogLevel = LogLevel.INFO): void {
    LoggerManager.getInstance().logger.setLevel(level);
  }

  /**
   * Disables all logs
   */
  public static disableLogs(): void {
    LoggerManager.getInstance().logger.setLevel(LogLevel.OFF);
  }

  public static debug(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.debug(message, ...args);
  }

  public static info(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.info(message, ...args);
  }

  public static warn(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.warn(message, ...args);
  }

  public static error(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.error(message, ...args);
  }
}
