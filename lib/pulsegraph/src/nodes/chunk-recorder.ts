import { OutputNode } from '../engine/roles';
import type { INodeOptions, UpstreamDependency } from '../types/node-api';
import type { SignalChunk } from '../types/signal';
import { ValidationError } from '../utils/node-error';
import { cloneChunk } from '../utils/signal/chunk';

export interface ChunkRecorderParams {
  /** Oldest chunks are dropped beyond this count */
  maxChunks: number;
}

/**
 * Keeps copies of the chunks it receives
 */
export class ChunkRecorder extends OutputNode<ChunkRecorderParams> {
  readonly resetTriggers = ['maxChunks'] as const;
  readonly upstreamDependencies: readonly UpstreamDependency[] = [];

  private recorded: SignalChunk[] = [];
  private breaks = 0;

  constructor(params: Partial<ChunkRecorderParams> = {}, options?: INodeOptions) {
    super({ maxChunks: params.maxChunks ?? 1000 }, options);
  }

  get chunks(): readonly SignalChunk[] {
    return [...this.recorded];
  }

  /**
   * Latest recorded chunk, if any
   */
  get last(): SignalChunk | null {
    return this.recorded[this.recorded.length - 1] ?? null;
  }

  /**
   * How many times upstream reported a discontinuity since initialization
   */
  get historyBreaks(): number {
    return this.breaks;
  }

  protected override validateParams(params: Readonly<ChunkRecorderParams>): void {
    if (!Number.isInteger(params.maxChunks) || params.maxChunks < 1) {
      throw new ValidationError(
        `maxChunks must be a positive integer, got ${params.maxChunks}`,
        this.id,
        'maxChunks'
      );
    }
  }

  protected onInitialize(): void {
    this.recorded = [];
    this.breaks = 0;
  }

  protected onUpdate(): void {
    this.recorded.push(cloneChunk(this.requireInput()));
    if (this.recorded.length > this.params.maxChunks) {
      this.recorded.splice(0, this.recorded.length - this.params.maxChunks);
    }
  }

  protected onReset(): boolean {
    this.recorded = [];
    return false;
  }

  protected onInputHistoryInvalidation(): void {
    this.breaks++;
  }
}
