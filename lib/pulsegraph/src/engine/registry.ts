import type { IGraphNode } from '../types/node-api';
import type { INodeRegistry } from '../types/registry-api';
import { FULL_INVALIDATION, Message } from './message';
import { ProtocolViolationError } from '../utils/node-error';

/**
 * Arena of node handles plus adjacency lists.
 *
 * Every node has at most one upstream; a node may feed any number of
 * listeners. Nodes do not hold references to each other: they ask the
 * registry they are attached to.
 */
export class NodeRegistry implements INodeRegistry {
  private readonly nodes = new Map<string, IGraphNode>();
  private readonly upstreams = new Map<string, string>();
  private readonly listeners = new Map<string, Set<string>>();

  /**
   * Registers a node
   * @throws ProtocolViolationError if the node (or its id) is already registered here or elsewhere
   */
  add(node: IGraphNode): void {
    if (this.nodes.has(node.id)) {
      throw new ProtocolViolationError(
        'duplicate-node',
        `Trying to add ${node.type} '${node.id}' that has already been added`,
        node.id
      );
    }
    if (node.registry !== null && node.registry !== this) {
      throw new ProtocolViolationError(
        'foreign-graph',
        `Node '${node.id}' belongs to another registry`,
        node.id
      );
    }
    this.nodes.set(node.id, node);
    this.listeners.set(node.id, new Set());
    node.attachRegistry(this);
  }

  has(node: IGraphNode): boolean {
    return this.nodes.get(node.id) === node;
  }

  get(id: string): IGraphNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * Disconnects a node from its upstream and its listeners, then unregisters it.
   * Former listeners are left without upstream.
   */
  remove(node: IGraphNode): void {
    this.assertRegistered(node);
    for (const listener of this.listenersOf(node)) {
      this.connect(listener, null);
    }
    this.connect(node, null);
    this.nodes.delete(node.id);
    this.listeners.delete(node.id);
    node.detachRegistry(this);
  }

  /**
   * Assigns the upstream of `node`.
   *
   * Unregistered nodes are added first. A node that was initialized is
   * scheduled for reinitialization, and a new upstream immediately sends the
   * node a full invalidation message.
   */
  connect(node: IGraphNode, upstream: IGraphNode | null): void {
    if (!this.has(node)) {
      this.add(node);
    }
    if (upstream && !this.has(upstream)) {
      this.add(upstream);
    }

    const currentId = this.upstreams.get(node.id);
    if (currentId === (upstream?.id ?? undefined)) {
      return;
    }

    if (upstream && (node.role === 'source' || upstream.role === 'output')) {
      throw new ProtocolViolationError(
        'invalid-edge',
        `A ${node.role} node cannot listen to a ${upstream.role} node ('${node.id}' <- '${upstream.id}')`,
        node.id
      );
    }

    if (upstream && this.reaches(upstream, node)) {
      throw new ProtocolViolationError(
        'cycle',
        `Connecting '${node.id}' to '${upstream.id}' would create a cycle`,
        node.id
      );
    }

    node.markReinitializeNeeded();

    if (currentId !== undefined) {
      this.listeners.get(currentId)?.delete(node.id);
      this.upstreams.delete(node.id);
    }

    if (upstream) {
      this.upstreams.set(node.id, upstream.id);
      this.listeners.get(upstream.id)?.add(node.id);
      node.receiveMessage(FULL_INVALIDATION);
    }
  }

  upstreamOf(node: IGraphNode): IGraphNode | null {
    const upstreamId = this.upstreams.get(node.id);
    return upstreamId === undefined ? null : (this.nodes.get(upstreamId) ?? null);
  }

  /**
   * Listeners in registration order
   */
  listenersOf(node: IGraphNode): readonly IGraphNode[] {
    const ids = this.listeners.get(node.id);
    if (!ids) {
      return [];
    }
    const result: IGraphNode[] = [];
    for (const id of ids) {
      const listener = this.nodes.get(id);
      if (listener) {
        result.push(listener);
      }
    }
    return result;
  }

  /**
   * Synchronously hands `message` to every listener of `from`
   */
  deliver(from: IGraphNode, message: Message): void {
    for (const listener of this.listenersOf(from)) {
      listener.receiveMessage(message);
    }
  }

  /**
   * Nodes in insertion order
   */
  getNodes(): readonly IGraphNode[] {
    return [...this.nodes.values()];
  }

  /**
   * Roots first, each listener after its upstream. Roots keep insertion
   * order and listeners keep registration order.
   */
  topologicalOrder(): readonly IGraphNode[] {
    const order: IGraphNode[] = [];
    const visit = (node: IGraphNode): void => {
      order.push(node);
      for (const listener of this.listenersOf(node)) {
        visit(listener);
      }
    };
    for (const node of this.nodes.values()) {
      if (!this.upstreams.has(node.id)) {
        visit(node);
      }
    }
    return order;
  }

  /**
   * Edges are validated on every connect, so this only fails if the
   * adjacency maps were corrupted
   */
  isAcyclic(): boolean {
    return this.topologicalOrder().length === this.nodes.size;
  }

  public get size(): number {
    return this.nodes.size;
  }

  /**
   * Whether walking upstream from `from` reaches `target` (or starts at it)
   */
  private reaches(from: IGraphNode, target: IGraphNode): boolean {
    let currentId: string | undefined = from.id;
    const seen = new Set<string>();
    while (currentId !== undefined && !seen.has(currentId)) {
      if (currentId === target.id) {
        return true;
      }
      seen.add(currentId);
      currentId = this.upstreams.get(currentId);
    }
    return false;
  }

  private assertRegistered(node: IGraphNode): void {
    if (!this.has(node)) {
      throw new ProtocolViolationError(
        'unknown-node',
        `Node '${node.id}' is not part of this registry`,
        node.id
      );
    }
  }
}
