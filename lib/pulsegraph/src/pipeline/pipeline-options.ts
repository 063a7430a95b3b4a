import type { ILogger } from '../types/logger';
import type { IPipelineOptions } from '../types/pipeline-options';
import { LoggerManager } from '../utils/logging';

export const DEFAULT_TICK_INTERVAL_MS = 100;

export interface ResolvedPipelineOptions {
  readonly pipelineId: string;
  /** Explicit logger, if one was given */
  readonly logger?: ILogger;
  readonly tickIntervalMs: number;
}

let pipelineSequence = 0;

/**
 * Fills in defaults and rejects unusable values
 */
export function resolvePipelineOptions(options: IPipelineOptions = {}): ResolvedPipelineOptions {
  const tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  if (!Number.isFinite(tickIntervalMs) || tickIntervalMs < 0) {
    throw new RangeError(`tickIntervalMs must be a non-negative number, got ${tickIntervalMs}`);
  }

  if (options.logLevel !== undefined) {
    (options.logger ?? LoggerManager.getInstance().getLogger()).setLevel(options.logLevel);
  }

  return {
    pipelineId: options.pipelineId ?? `pipeline-${++pipelineSequence}`,
    logger: options.logger,
    tickIntervalMs,
  };
}
