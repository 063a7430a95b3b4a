import type { Message } from '../engine/message';
import type { ChannelInfo, ReadonlyChunk } from './signal';
import type { NodeLifecycleState, PendingFlags } from './node-state';
import type { SnapshotValue } from './utils';
import type { ILogger } from './logger';
import type { INodeRegistry } from './registry-api';

/**
 * Position of a node in the processing chain
 */
export type NodeRole = 'source' | 'processor' | 'output';

/**
 * Result of asking a node for one of its attributes
 */
export type AttributeLookup =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false };

/**
 * Upstream attribute whose drift requires reinitialization.
 * Mutable values need a `snapshot` reducer to something comparable.
 */
export interface UpstreamDependency {
  readonly attribute: string;
  readonly snapshot?: (value: unknown) => SnapshotValue;
}

/**
 * Options common to every node
 */
export interface INodeOptions {
  /**
   * Identifier, unique within a registry. Generated when omitted.
   */
  id?: string;

  /**
   * Logger for this node. The LoggerManager logger is used when omitted.
   */
  logger?: ILogger;
}

/**
 * The surface the registry and the pipeline drive nodes through.
 * They never depend on concrete node classes.
 */
export interface IGraphNode {
  readonly id: string;
  readonly type: string;
  readonly role: NodeRole;
  readonly output: ReadonlyChunk | null;
  readonly initialized: boolean;
  readonly lifecycleState: NodeLifecycleState;
  readonly pendingFlags: PendingFlags;
  readonly registry: INodeRegistry | null;
  readonly upstream: IGraphNode | null;
  readonly listeners: readonly IGraphNode[];

  readAttribute(name: string): AttributeLookup;
  receiveMessage(message: Message): void;
  markReinitializeNeeded(): void;
  initialize(): void;
  update(): void;
  chainInitialize(): void;

  /** @internal called by the registry */
  attachRegistry(registry: INodeRegistry): void;
  /** @internal called by the registry */
  detachRegistry(registry: INodeRegistry): void;
}

export interface ISourceNode extends IGraphNode {
  readonly role: 'source';
  readonly channelInfo: ChannelInfo | null;
  readonly isAlive: boolean;
}

export interface IProcessorNode extends IGraphNode {
  readonly role: 'processor';
  disabled: boolean;
}

export interface IOutputNode extends IGraphNode {
  readonly role: 'output';
  disabled: boolean;
}

/**
 * Any node a pipeline can hold, discriminated by `role`
 */
export type PipelineNode = ISourceNode | IProcessorNode | IOutputNode;

export function isProcessorNode(node: IGraphNode): node is IProcessorNode {
  return node.role === 'processor';
}
