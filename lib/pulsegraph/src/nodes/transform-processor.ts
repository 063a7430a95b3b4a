import { ProcessorNode } from '../engine/roles';
import type { INodeOptions, UpstreamDependency } from '../types/node-api';
import type { ChannelInfo, ReadonlyChunk } from '../types/signal';
import { channelCountSnapshot } from '../utils/signal/channel-info';

/**
 * Computation plugged into a TransformProcessor, typically backed by a
 * signal-processing library. Must return a new chunk or its input unchanged.
 */
export type ChunkTransform = (chunk: ReadonlyChunk, channelInfo: ChannelInfo) => ReadonlyChunk;

export interface TransformProcessorParams {
  transform: ChunkTransform;
}

const identity: ChunkTransform = chunk => chunk;

/**
 * Applies a stateless transform to every chunk. Replacing the transform is a
 * local change: listeners keep their history.
 */
export class TransformProcessor extends ProcessorNode<TransformProcessorParams> {
  readonly resetTriggers = ['transform'] as const;
  readonly upstreamDependencies: readonly UpstreamDependency[] = [
    { attribute: 'channelInfo', snapshot: channelCountSnapshot },
  ];

  constructor(transform: ChunkTransform = identity, options?: INodeOptions) {
    super({ transform }, options);
  }

  protected onInitialize(): void {
    this.upstreamChannelInfo();
  }

  // Channel info is read per chunk: bads and types change without a reinitialization
  protected onUpdate(): void {
    this.setOutput(this.params.transform(this.requireInput(), this.upstreamChannelInfo()));
  }

  protected onReset(): boolean {
    return false;
  }

  protected onInputHistoryInvalidation(): void {
    // stateless
  }
}
