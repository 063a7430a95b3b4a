import type { Serializable } from './utils';

/**
 * Logging level enumeration
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  OFF = 100, // Disable all logs
}

/**
 * Metadata attached to logged events
 */
export type LogMetadata = Readonly<Record<string, Serializable>>;

/**
 * Logger interface
 */
export interface ILogger {
  /**
   * Sets logging level
   * @param level Logging level to set
   */
  setLevel(level: LogLevel): void;

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel;

  /**
   * Checks if specified logging level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean;

  /**
   * Logs message with specified level
   * @param level Logging level
   * @param message Message to log
   * @param args Additional arguments to log
   */
  log(level: LogLevel, message: string, ...args: readonly unknown[]): void;

  debug(message: string, ...args: readonly unknown[]): void;

  info(message: string, ...args: readonly unknown[]): void;

  warn(message: string, ...args: readonly unknown[]): void;

  error(message: string, ...args: readonly unknown[]): void;

  fatal(message: string, ...args: readonly unknown[]): void;

  /**
   * Logs a structured event
   * @param category Event category (e.g. 'node', 'pipeline')
   * @param eventName Event name
   * @param metadata Additional metadata
   * @param level Level the event is logged at (INFO when omitted)
   */
  logEvent(category: string, eventName: string, metadata?: LogMetadata, level?: LogLevel): void;

  /**
   * Runs `action`, logging its duration as an event (or an `:error` event
   * when it throws, in which case the error is rethrown)
   */
  measureTime<T>(category: string, operation: string, action: () => T, metadata?: LogMetadata): T;
}
