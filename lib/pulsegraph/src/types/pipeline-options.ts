import type { ILogger, LogLevel } from './logger';

/**
 * Options for pipeline creation
 */
export interface IPipelineOptions {
  /**
   * Identifier used in logs, errors and snapshots. Generated when omitted.
   */
  pipelineId?: string;

  /**
   * Logger for pipeline events. The LoggerManager logger is used when omitted.
   */
  logger?: ILogger;

  /**
   * Level applied to `logger` on creation
   */
  logLevel?: LogLevel;

  /**
   * Period of `run()` when no interval is passed (ms)
   */
  tickIntervalMs?: number;
}
