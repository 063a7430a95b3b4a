import { SourceNode } from '../engine/roles';
import type { ChannelType, ReadonlyChunk } from '../types/signal';
import { ValidationError } from '../utils/node-error';
import { createChannelInfo } from '../utils/signal/channel-info';

export interface ChunkSourceParams {
  channelNames: readonly string[];
  /** Samples per second */
  samplingRate: number;
  /** Defaults to EEG for every channel */
  channelTypes?: readonly ChannelType[];
  bads?: readonly string[];
}

/**
 * Replays chunks handed over by an acquisition device, a file reader or a test.
 *
 * Each update emits the oldest pushed chunk, or nothing when the queue is
 * empty. After `close()` the source stays alive until the queue is drained.
 */
export class ChunkSource extends SourceNode<ChunkSourceParams> {
  readonly resetTriggers = ['channelNames', 'samplingRate', 'channelTypes', 'bads'] as const;

  private readonly queue: ReadonlyChunk[] = [];
  private closed = false;

  override get isAlive(): boolean {
    return !this.closed || this.queue.length > 0;
  }

  get pendingChunks(): number {
    return this.queue.length;
  }

  /**
   * Queues a chunk for a later update. The chunk must not be mutated afterwards.
   */
  push(...chunks: ReadonlyChunk[]): void {
    if (this.closed) {
      throw new ValidationError(`Source '${this.id}' has been closed`, this.id);
    }
    this.queue.push(...chunks);
  }

  /**
   * No more chunks will be pushed
   */
  close(): void {
    this.closed = true;
  }

  protected override validateParams(params: Readonly<ChunkSourceParams>): void {
    if (!Number.isFinite(params.samplingRate) || params.samplingRate <= 0) {
      throw new ValidationError(
        `Sampling rate must be a positive number, got ${params.samplingRate}`,
        this.id,
        'samplingRate'
      );
    }
  }

  protected onInitialize(): void {
    this.setChannelInfo(
      createChannelInfo(this.params.channelNames, this.params.samplingRate, {
        channelTypes: this.params.channelTypes,
        bads: this.params.bads,
      })
    );
  }

  protected onUpdate(): void {
    const chunk = this.queue.shift();
    if (!chunk) {
      return;
    }
    const expected = this.params.channelNames.length;
    if (chunk.channelCount !== expected) {
      throw new ValidationError(
        `Source '${this.id}' received a chunk with ${chunk.channelCount} channels, expected ${expected}`,
        this.id
      );
    }
    this.setOutput(chunk);
  }
}
