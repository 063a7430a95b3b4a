import type { Message } from '../engine/message';
import type { IGraphNode } from './node-api';

/**
 * Arena of nodes with their upstream/listener adjacency
 */
export interface INodeRegistry {
  add(node: IGraphNode): void;
  has(node: IGraphNode): boolean;
  remove(node: IGraphNode): void;
  connect(node: IGraphNode, upstream: IGraphNode | null): void;
  upstreamOf(node: IGraphNode): IGraphNode | null;
  listenersOf(node: IGraphNode): readonly IGraphNode[];
  deliver(from: IGraphNode, message: Message): void;
  getNodes(): readonly IGraphNode[];
  topologicalOrder(): readonly IGraphNode[];
  readonly size: number;
}
