import { LogLevel } from '../../types/logger';
import { LoggerAdapter } from './logger-adapter';

/**
 * Adapter for console logging with additional capabilities:
 * - storing recent log lines in memory
 * - printing error stacks at debug level
 */
export class ConsoleLoggerAdapter extends LoggerAdapter {
  private logStorage: string[] = [];
  private maxLogSize = 100;

  constructor(private readonly name?: string) {
    super();
  }

  log(level: LogLevel, message: string, ...args: readonly unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = this.name ? `${LogLevel[level]} ${this.name}` : LogLevel[level];
    const formattedMessage = `[${timestamp}] ${prefix}: ${message}`;

    /* eslint-disable no-console */
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, ...args);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...args);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage, ...args);
        break;
      case LogLevel.FATAL:
        console.error(`FATAL ${formattedMessage}`, ...args);
        break;
      default:
        console.log(formattedMessage, ...args);
    }
    /* eslint-enable no-console */

    this.addToStorage(formattedMessage);
  }

  private addToStorage(message: string): void {
    this.logStorage.push(message);

    if (this.logStorage.length > this.maxLogSize) {
      this.logStorage.shift();
    }
  }

  /**
   * Sets maximum size of stored logs
   */
  setMaxLogSize(size: number): void {
    this.maxLogSize = size > 0 ? size : 100;
  }

  clear(): void {
    this.logStorage = [];
  }

  /**
   * Returns stored log lines, oldest first
   */
  getLogs(): string[] {
    return [...this.logStorage];
  }

  /**
   * Extended version of error method with error stack support
   */
  public override error(message: string, ...args: readonly unknown[]): void {
    const errorObj = args.find((arg): arg is Error => arg instanceof Error);
    const otherArgs = args.filter(arg => !(arg instanceof Error));

    const fullMessage = errorObj ? `${message}: ${errorObj.message}` : message;
    this.log(LogLevel.ERROR, fullMessage, ...otherArgs);

    if (errorObj?.stack) {
      this.log(LogLevel.DEBUG, `Stack: ${errorObj.stack}`);
    }
  }
}
