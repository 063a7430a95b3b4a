import { Observable, Subject } from 'rxjs';
import type { ILogger } from '../types/logger';
import { LogLevel } from '../types/logger';
import type {
  AttributeLookup,
  IGraphNode,
  INodeOptions,
  NodeRole,
  UpstreamDependency,
} from '../types/node-api';
import type { INodeRegistry } from '../types/registry-api';
import { NodeLifecycleState, PendingFlags } from '../types/node-state';
import type { ReadonlyChunk } from '../types/signal';
import type { SnapshotValue } from '../types/utils';
import { LoggerManager } from '../utils/logging';
import { ProtocolViolationError, UpstreamAttributeError } from '../utils/node-error';
import { isSnapshotValue, snapshotsEqual } from '../utils/signal/snapshot';
import { createMessage, FULL_INVALIDATION, Message } from './message';

/**
 * Lifecycle notifications published on `Node.lifecycle$`
 */
export interface NodeLifecycleEvent {
  readonly nodeId: string;
  readonly type: 'initialized' | 'reset' | 'history-invalidated' | 'reset-scheduled';
  readonly message?: Message;
}

let nodeSequence = 0;

/**
 * One stage of the processing chain.
 *
 * Attributes live in `TParams` and are changed through `set`. Keys listed in
 * `resetTriggers` schedule a reset; upstream attributes listed in
 * `upstreamDependencies` schedule a reinitialization when they drift. All
 * scheduled work is resolved lazily by the next `update()` call, in this
 * order: reinitialize, reset, input history invalidation.
 *
 * Concrete nodes implement `onInitialize`, `onUpdate`, `onReset` and
 * `onInputHistoryInvalidation`.
 *
 * @template TParams Attributes of the node
 */
export abstract class Node<TParams extends object = Record<string, never>> implements IGraphNode {
  abstract readonly role: NodeRole;

  /**
   * Attributes whose change requires a reset
   */
  abstract readonly resetTriggers: readonly (keyof TParams)[];

  /**
   * Upstream attributes whose drift requires reinitialization
   */
  abstract readonly upstreamDependencies: readonly UpstreamDependency[];

  readonly id: string;

  private attributes: TParams;
  private currentOutput: ReadonlyChunk | null = null;
  private isInitialized = false;
  private readonly flags = {
    reinitialize: false,
    reset: false,
    inputHistoryInvalid: false,
    upstreamChanged: false,
  };
  private upstreamSnapshot: Map<string, SnapshotValue> | null = null;
  private suppressionDepth = 0;
  private rebuiltDuringReset = false;
  private attachedRegistry: INodeRegistry | null = null;
  private readonly customLogger?: ILogger;
  private readonly lifecycleSubject = new Subject<NodeLifecycleEvent>();

  constructor(params: TParams, options: INodeOptions = {}) {
    this.id = options.id ?? `${new.target.name}-${++nodeSequence}`;
    this.customLogger = options.logger;
    this.validateParams(params);
    this.attributes = { ...params };
  }

  /**
   * Node type name used in logs and snapshots
   */
  get type(): string {
    return this.constructor.name;
  }

  /**
   * Result of the last update. Replaced (never mutated) by every update.
   */
  get output(): ReadonlyChunk | null {
    return this.currentOutput;
  }

  get initialized(): boolean {
    return this.isInitialized;
  }

  get params(): Readonly<TParams> {
    return this.attributes;
  }

  get registry(): INodeRegistry | null {
    return this.attachedRegistry;
  }

  get upstream(): IGraphNode | null {
    return this.attachedRegistry?.upstreamOf(this) ?? null;
  }

  get listeners(): readonly IGraphNode[] {
    return this.attachedRegistry?.listenersOf(this) ?? [];
  }

  /**
   * Output of the upstream node, read-only and valid until its next update
   */
  protected get input(): ReadonlyChunk | null {
    return this.upstream?.output ?? null;
  }

  /**
   * Stream of lifecycle notifications, delivered synchronously
   */
  get lifecycle$(): Observable<NodeLifecycleEvent> {
    return this.lifecycleSubject.asObservable();
  }

  get pendingFlags(): PendingFlags {
    return Object.freeze({ ...this.flags });
  }

  get lifecycleState(): NodeLifecycleState {
    if (!this.isInitialized) {
      return NodeLifecycleState.UNINITIALIZED;
    }
    if (this.flags.reinitialize) {
      return NodeLifecycleState.PENDING_REINITIALIZE;
    }
    if (this.flags.reset) {
      return NodeLifecycleState.PENDING_RESET;
    }
    if (this.flags.inputHistoryInvalid) {
      return NodeLifecycleState.PENDING_HISTORY_INVALIDATION;
    }
    return NodeLifecycleState.INITIALIZED;
  }

  protected get logger(): ILogger {
    return this.customLogger ?? LoggerManager.getInstance().getLogger();
  }

  /**
   * Whether attribute changes are currently kept from scheduling a reset
   */
  protected get triggersSuppressed(): boolean {
    return this.suppressionDepth > 0;
  }

  get<K extends keyof TParams>(key: K): TParams[K] {
    return this.attributes[key];
  }

  /**
   * Validates and assigns an attribute. Reset triggers schedule a reset
   * unless called from inside a lifecycle hook.
   * @throws ValidationError when the value is outside the attribute's domain
   */
  set<K extends keyof TParams>(key: K, value: TParams[K]): void {
    const candidate = { ...this.attributes };
    candidate[key] = value;
    this.validateParams(candidate);
    this.attributes = candidate;

    if (this.resetTriggers.includes(key)) {
      this.markResetNeeded();
    }
  }

  /**
   * Schedules a reset for the next update. No-op inside lifecycle hooks.
   */
  markResetNeeded(): void {
    if (this.triggersSuppressed || this.flags.reset) {
      return;
    }
    this.flags.reset = true;
    this.logger.logEvent('node', 'reset-scheduled', { nodeId: this.id }, LogLevel.DEBUG);
    this.lifecycleSubject.next({ nodeId: this.id, type: 'reset-scheduled' });
  }

  /**
   * Schedules a reinitialization if the node has been initialized
   */
  markReinitializeNeeded(): void {
    if (this.isInitialized) {
      this.flags.reinitialize = true;
    }
  }

  /**
   * Records what an upstream node reported. Flags are only ever raised here.
   */
  receiveMessage(message: Message): void {
    if (message.changed) {
      this.flags.upstreamChanged = true;
    }
    if (message.historyInvalid) {
      this.flags.inputHistoryInvalid = true;
    }
  }

  /**
   * Advances the node by one step, resolving pending work first
   */
  update(): void {
    const start = performance.now();
    this.currentOutput = null;

    if (this.flags.upstreamChanged) {
      if (!this.flags.reinitialize && this.upstreamDriftRequiresReinitialization()) {
        this.flags.reinitialize = true;
      }
      this.flags.upstreamChanged = false;
    }

    if (!this.isInitialized || this.flags.reinitialize) {
      this.initialize();
    } else if (!this.hasPendingChanges()) {
      this.onUpdate();
    } else {
      if (this.flags.reset) {
        this.reset();
      }
      if (this.flags.inputHistoryInvalid) {
        this.invalidateInputHistory();
      }
    }

    this.logger.logEvent(
      'node',
      'update',
      { nodeId: this.id, duration: `${(performance.now() - start).toFixed(1)}ms` },
      LogLevel.DEBUG
    );
  }

  /**
   * Builds the node's derived state from scratch and tells listeners that
   * everything changed
   * @throws ProtocolViolationError if the node is initialized and no reinitialization is pending
   */
  initialize(): void {
    if (this.isInitialized && !this.flags.reinitialize) {
      throw new ProtocolViolationError(
        'unexpected-initialize',
        `Trying to initialize ${this.type} '${this.id}' even though there is no indication for it`,
        this.id
      );
    }

    this.runInitialization();
    this.announce('initialized', FULL_INVALIDATION);
  }

  /**
   * Applies changed reset-triggering attributes
   * @throws ProtocolViolationError if no reset is pending
   */
  reset(): void {
    if (!this.flags.reset) {
      throw new ProtocolViolationError(
        'unexpected-reset',
        `Trying to reset ${this.type} '${this.id}' even though there is no indication for it`,
        this.id
      );
    }

    this.rebuiltDuringReset = false;
    const historyInvalid = this.withTriggersSuppressed(() =>
      this.logger.measureTime('node', 'reset', () => this.onReset(), {
        nodeId: this.id,
        type: this.type,
      })
    );
    this.flags.reset = false;

    if (this.rebuiltDuringReset) {
      this.rebuiltDuringReset = false;
      this.announce('initialized', FULL_INVALIDATION);
      return;
    }
    this.announce('reset', createMessage(true, historyInvalid));
  }

  /**
   * Drops state that depends on past inputs
   * @throws ProtocolViolationError if input history has not been invalidated
   */
  invalidateInputHistory(): void {
    if (!this.flags.inputHistoryInvalid) {
      throw new ProtocolViolationError(
        'unexpected-history-invalidation',
        `Trying to flush history of ${this.type} '${this.id}' even though there is no indication for it`,
        this.id
      );
    }

    this.withTriggersSuppressed(() =>
      this.logger.measureTime(
        'node',
        'history-invalidation',
        () => this.onInputHistoryInvalidation(),
        { nodeId: this.id, type: this.type }
      )
    );
    this.flags.inputHistoryInvalid = false;
    this.announce('history-invalidated', FULL_INVALIDATION);
  }

  /**
   * Initializes this node if needed, then every node downstream of it
   */
  chainInitialize(): void {
    if (!this.isInitialized || this.flags.reinitialize) {
      this.initialize();
    }
    for (const listener of this.listeners) {
      listener.chainInitialize();
    }
  }

  /**
   * Attributes other nodes can look up through `findUpstream`.
   * Params are exposed by default.
   */
  readAttribute(name: string): AttributeLookup {
    if (Object.prototype.hasOwnProperty.call(this.attributes, name)) {
      const value: unknown = Reflect.get(this.attributes, name);
      return { found: true, value };
    }
    return { found: false };
  }

  /**
   * Walks up the chain until a node exposes `attribute`
   * @throws UpstreamAttributeError if no predecessor exposes it
   */
  findUpstream(attribute: string): unknown {
    let current = this.upstream;
    while (current) {
      const lookup = current.readAttribute(attribute);
      if (lookup.found) {
        return lookup.value;
      }
      current = current.upstream;
    }
    throw new UpstreamAttributeError(this.id, attribute);
  }

  /**
   * @internal
   */
  attachRegistry(registry: INodeRegistry): void {
    if (this.attachedRegistry !== null && this.attachedRegistry !== registry) {
      throw new ProtocolViolationError(
        'foreign-graph',
        `Node '${this.id}' belongs to another registry`,
        this.id
      );
    }
    this.attachedRegistry = registry;
  }

  /**
   * @internal
   */
  detachRegistry(registry: INodeRegistry): void {
    if (this.attachedRegistry === registry) {
      this.attachedRegistry = null;
    }
  }

  /**
   * Runs `fn` while attribute changes do not schedule resets. Re-entrant.
   */
  protected withTriggersSuppressed<T>(fn: () => T): T {
    this.suppressionDepth++;
    try {
      return fn();
    } finally {
      this.suppressionDepth--;
    }
  }

  /**
   * Upstream output for `onUpdate`, which roles only call with data present
   * @throws ProtocolViolationError when there is nothing to read
   */
  protected requireInput(): ReadonlyChunk {
    const input = this.input;
    if (!input) {
      throw new ProtocolViolationError(
        'missing-input',
        `${this.type} '${this.id}' has no upstream output to read`,
        this.id
      );
    }
    return input;
  }

  protected setOutput(chunk: ReadonlyChunk | null): void {
    this.currentOutput = chunk;
  }

  /**
   * For `onReset` implementations that just start over: reinitializes the
   * node. The reset is then announced as an initialization.
   */
  protected rebuild(): boolean {
    this.runInitialization();
    this.rebuiltDuringReset = true;
    return true;
  }

  /**
   * Throws ValidationError for values outside an attribute's domain.
   * Called from the base constructor, before subclass fields are assigned.
   */
  protected validateParams(_params: Readonly<TParams>): void {
    // every value is accepted by default
  }

  /**
   * Role-specific check run after `onInitialize`, before the node is
   * considered initialized
   */
  protected validateInitialization(): void {
    // nothing to check by default
  }

  /**
   * Prepares everything for the first update. When called again it must
   * remove all traces of the past.
   */
  protected abstract onInitialize(): void;

  /**
   * Computes `output` from the upstream output
   */
  protected abstract onUpdate(): void;

  /**
   * Applies changed reset triggers.
   * @returns true if listeners should forget everything that happened before,
   *   false if the change is strictly local
   */
  protected abstract onReset(): boolean;

  /**
   * Resets whatever relies on previous inputs
   */
  protected abstract onInputHistoryInvalidation(): void;

  private hasPendingChanges(): boolean {
    return this.flags.reinitialize || this.flags.reset || this.flags.inputHistoryInvalid;
  }

  private clearPendingFlags(): void {
    this.flags.reinitialize = false;
    this.flags.reset = false;
    this.flags.inputHistoryInvalid = false;
    this.flags.upstreamChanged = false;
  }

  /**
   * Runs `onInitialize` and the checks after it. Listeners are not told.
   */
  private runInitialization(): void {
    this.withTriggersSuppressed(() => {
      this.isInitialized = false;
      this.logger.measureTime(
        'node',
        'initialize',
        () => {
          this.onInitialize();
          this.validateInitialization();
          this.upstreamSnapshot = this.captureUpstreamSnapshot();
        },
        { nodeId: this.id, type: this.type }
      );
      this.isInitialized = true;
      this.clearPendingFlags();
    });
  }

  /**
   * Sends `message` to listeners and publishes the event. Runs outside hook
   * suppression so subscribers may schedule resets.
   */
  private announce(
    type: Exclude<NodeLifecycleEvent['type'], 'reset-scheduled'>,
    message: Message
  ): void {
    this.attachedRegistry?.deliver(this, message);
    this.lifecycleSubject.next({ nodeId: this.id, type, message });
  }

  private captureUpstreamSnapshot(): Map<string, SnapshotValue> {
    const snapshot = new Map<string, SnapshotValue>();
    for (const dependency of this.upstreamDependencies) {
      snapshot.set(dependency.attribute, this.snapshotOf(dependency));
    }
    return snapshot;
  }

  private upstreamDriftRequiresReinitialization(): boolean {
    if (!this.isInitialized || !this.upstreamSnapshot) {
      return false;
    }
    for (const [attribute, saved] of this.upstreamSnapshot) {
      const dependency = this.upstreamDependencies.find(dep => dep.attribute === attribute);
      if (!dependency) {
        continue;
      }
      if (!snapshotsEqual(saved, this.snapshotOf(dependency))) {
        this.logger.logEvent('node', 'upstream-drift', { nodeId: this.id, attribute });
        return true;
      }
    }
    return false;
  }

  private snapshotOf(dependency: UpstreamDependency): SnapshotValue {
    const value = this.findUpstream(dependency.attribute);
    const reduced = dependency.snapshot ? dependency.snapshot(value) : value;
    if (!isSnapshotValue(reduced)) {
      throw new ProtocolViolationError(
        'uncomparable-snapshot',
        `Upstream attribute '${dependency.attribute}' of ${this.type} '${this.id}' cannot be compared. ` +
          'Give the dependency a snapshot function that reduces it to primitives.',
        this.id
      );
    }
    return reduced;
  }
}
