import type {
  AttributeLookup,
  IOutputNode,
  IProcessorNode,
  ISourceNode,
  UpstreamDependency,
} from '../types/node-api';
import type { ChannelInfo } from '../types/signal';
import { ValidationError } from '../utils/node-error';
import { isChannelInfo, validateChannelInfo } from '../utils/signal/channel-info';
import { isEmptyChunk } from '../utils/signal/chunk';
import { Node } from './node';

/**
 * Reads data from an acquisition device, a file or memory.
 *
 * Has no upstream. `onInitialize` must provide channel info through
 * `setChannelInfo`; initialization is rejected when the descriptor is
 * missing, has no channels or is inconsistent.
 */
export abstract class SourceNode<
  TParams extends object = Record<string, never>,
> extends Node<TParams>
  implements ISourceNode
{
  readonly role = 'source' as const;
  readonly upstreamDependencies: readonly UpstreamDependency[] = [];

  private info: ChannelInfo | null = null;

  get channelInfo(): ChannelInfo | null {
    return this.info;
  }

  /**
   * Whether the source can still produce data. Periodic runs stop once it
   * turns false.
   */
  get isAlive(): boolean {
    return true;
  }

  override initialize(): void {
    if (!this.initialized || this.pendingFlags.reinitialize) {
      this.info = null;
    }
    super.initialize();
  }

  override readAttribute(name: string): AttributeLookup {
    if (name === 'channelInfo') {
      return { found: true, value: this.info };
    }
    return super.readAttribute(name);
  }

  protected setChannelInfo(info: ChannelInfo): void {
    this.info = info;
  }

  protected override validateInitialization(): void {
    validateChannelInfo(this.info, this.id);
  }

  /**
   * There is nothing to reset in a source: start over
   */
  protected onReset(): boolean {
    return this.rebuild();
  }

  protected onInputHistoryInvalidation(): void {
    // a source has no input
  }
}

/**
 * Transforms upstream output. Disabled processors pass their input through;
 * empty input produces empty output without running the node.
 */
export abstract class ProcessorNode<
  TParams extends object = Record<string, never>,
> extends Node<TParams>
  implements IProcessorNode
{
  readonly role = 'processor' as const;

  /**
   * Administrative switch, not a reset trigger
   */
  disabled = false;

  override update(): void {
    const input = this.input;
    if (this.disabled) {
      this.setOutput(input);
      return;
    }
    if (isEmptyChunk(input)) {
      this.setOutput(null);
      return;
    }
    super.update();
  }

  protected upstreamChannelInfo(): ChannelInfo {
    return channelInfoFrom(this.findUpstream('channelInfo'), this.id);
  }
}

/**
 * Terminal consumer (display, recorder, network sink). Never produces
 * output; disabled outputs and empty input have no effect.
 */
export abstract class OutputNode<
  TParams extends object = Record<string, never>,
> extends Node<TParams>
  implements IOutputNode
{
  readonly role = 'output' as const;

  disabled = false;

  override update(): void {
    if (this.disabled || isEmptyChunk(this.input)) {
      this.setOutput(null);
      return;
    }
    super.update();
  }

  protected upstreamChannelInfo(): ChannelInfo {
    return channelInfoFrom(this.findUpstream('channelInfo'), this.id);
  }
}

function channelInfoFrom(value: unknown, nodeId: string): ChannelInfo {
  if (!isChannelInfo(value)) {
    throw new ValidationError(
      `Upstream channel info of node ${nodeId} is not available`,
      nodeId,
      'channelInfo'
    );
  }
  return value;
}
