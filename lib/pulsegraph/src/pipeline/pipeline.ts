import { asyncScheduler, defer, interval, Observable, SchedulerLike } from 'rxjs';
import { map, takeWhile } from 'rxjs/operators';
import { HookManager } from '../engine/hook-manager';
import { NodeRegistry } from '../engine/registry';
import type { ILogger } from '../types/logger';
import type {
  IGraphNode,
  IOutputNode,
  IProcessorNode,
  ISourceNode,
  PipelineNode,
} from '../types/node-api';
import { isProcessorNode } from '../types/node-api';
import { PipelineEventHandlers, PipelineEventType, UnsubscribeFn } from '../types/pipeline-hooks';
import type { IPipelineOptions } from '../types/pipeline-options';
import type { INodeRegistry } from '../types/registry-api';
import type {
  NodeSnapshot,
  PipelineSnapshot,
  PipelineStats,
  TickReport,
} from '../types/pipeline-stats';
import { LoggerManager } from '../utils/logging';
import { getErrorMessage, ProtocolViolationError, ValidationError } from '../utils/node-error';
import { resolvePipelineOptions, ResolvedPipelineOptions } from './pipeline-options';

/**
 * Connects a source to a sequence of processors and to outputs.
 *
 * @example
 * ```typescript
 * const pipeline = new Pipeline();
 * pipeline.setSource(new ChunkSource({ channelNames: ['Fz', 'Cz'], samplingRate: 500 }));
 * pipeline.addProcessor(new EnvelopeExtractor({ factor: 0.9 }));
 * pipeline.addOutput(new ChunkRecorder());
 * pipeline.initializeAll();
 * pipeline.tick();
 * ```
 */
export class Pipeline {
  readonly id: string;

  private readonly graph = new NodeRegistry();
  private readonly hookManager: HookManager;
  private readonly options: ResolvedPipelineOptions;
  private currentSource: ISourceNode | null = null;
  private readonly processorList: IProcessorNode[] = [];
  private readonly outputList: IOutputNode[] = [];
  // Parent requested for each output; null keeps it attached to the chain tail
  private readonly outputParents = new Map<string, IGraphNode | null>();
  private tickCount = 0;
  private lastTickDurationMs: number | null = null;

  constructor(options: IPipelineOptions = {}) {
    this.options = resolvePipelineOptions(options);
    this.id = this.options.pipelineId;
    this.hookManager = new HookManager(this.options.logger);
  }

  get source(): ISourceNode | null {
    return this.currentSource;
  }

  get processors(): readonly IProcessorNode[] {
    return [...this.processorList];
  }

  get outputs(): readonly IOutputNode[] {
    return [...this.outputList];
  }

  /**
   * Source, processors and outputs, in that order
   */
  get allNodes(): readonly PipelineNode[] {
    const withSource: PipelineNode[] = this.currentSource ? [this.currentSource] : [];
    return [...withSource, ...this.processorList, ...this.outputList];
  }

  /**
   * The registry holding the pipeline's nodes and edges. Edit the structure
   * through the pipeline, not through the registry.
   */
  get registry(): INodeRegistry {
    return this.graph;
  }

  /**
   * Sampling rate reported by the source
   * @throws ValidationError if there is no source or it is not initialized
   */
  get samplingRate(): number {
    const info = this.currentSource?.channelInfo;
    if (!info) {
      throw new ValidationError(
        this.currentSource
          ? `Source of pipeline ${this.id} has no channel info yet`
          : `No source has been set in pipeline ${this.id}`,
        this.id
      );
    }
    return info.samplingRate;
  }

  private get logger(): ILogger {
    return this.options.logger ?? LoggerManager.getInstance().getLogger();
  }

  /**
   * Replaces the source. The first processor and every output attached to
   * the old source are moved to the new one.
   */
  setSource(source: ISourceNode): void {
    const previous = this.currentSource;
    if (previous === source) {
      return;
    }

    this.graph.add(source);
    this.currentSource = source;

    if (previous) {
      this.graph.remove(previous);
      for (const [outputId, parent] of this.outputParents) {
        if (parent === previous) {
          this.outputParents.set(outputId, source);
        }
      }
    }

    if (this.processorList.length > 0) {
      this.graph.connect(this.processorList[0], source);
    }
    this.reconnectOutputs();

    this.logger.logEvent('pipeline', 'source-changed', {
      pipelineId: this.id,
      sourceId: source.id,
      previousId: previous?.id ?? null,
    });
    this.hookManager.emit(PipelineEventType.SOURCE_CHANGED, source, previous);
  }

  /**
   * Appends a processor to the chain
   * @throws ProtocolViolationError if the processor has already been added
   */
  addProcessor(processor: IProcessorNode): void {
    this.insertProcessor(processor, this.processorList.length);
  }

  /**
   * Inserts a processor before the one currently at `index`
   * @throws ProtocolViolationError if the processor has already been added
   */
  insertProcessor(processor: IProcessorNode, index: number): void {
    if (this.processorList.includes(processor)) {
      throw new ProtocolViolationError(
        'duplicate-node',
        `Trying to add a ${processor.type} that has already been added`,
        processor.id
      );
    }

    const position = Math.max(0, Math.min(index, this.processorList.length));
    this.graph.add(processor);
    this.processorList.splice(position, 0, processor);

    const previous = position === 0 ? this.currentSource : this.processorList[position - 1];
    if (previous) {
      this.graph.connect(processor, previous);
    }
    const next = this.processorList[position + 1];
    if (next) {
      this.graph.connect(next, processor);
    }
    this.reconnectOutputs();

    this.logger.logEvent('pipeline', 'processor-added', {
      pipelineId: this.id,
      nodeId: processor.id,
      type: processor.type,
      position,
    });
    this.hookManager.emit(PipelineEventType.NODE_ADDED, processor);
  }

  /**
   * Removes a processor and links its neighbours. Outputs that were
   * attached to it explicitly become floating.
   */
  removeProcessor(processor: IProcessorNode): void {
    const position = this.processorList.indexOf(processor);
    if (position < 0) {
      throw new ProtocolViolationError(
        'unknown-node',
        `${processor.type} '${processor.id}' is not part of pipeline ${this.id}`,
        processor.id
      );
    }

    this.processorList.splice(position, 1);
    this.graph.remove(processor);

    for (const [outputId, parent] of this.outputParents) {
      if (parent === processor) {
        this.outputParents.set(outputId, null);
        this.logger.warn(
          `Output '${outputId}' lost its parent '${processor.id}' and now follows the chain tail`
        );
      }
    }

    const previous = position === 0 ? this.currentSource : this.processorList[position - 1];
    const next = this.processorList[position];
    if (next && previous) {
      this.graph.connect(next, previous);
    }
    this.reconnectOutputs();

    this.logger.logEvent('pipeline', 'processor-removed', {
      pipelineId: this.id,
      nodeId: processor.id,
    });
    this.hookManager.emit(PipelineEventType.NODE_REMOVED, processor);
  }

  /**
   * Adds an output. Without `parent` the output follows whatever node is
   * last in the chain, also after later structure edits.
   * @throws ProtocolViolationError if the output was already added or the parent is not in the pipeline
   */
  addOutput(output: IOutputNode, parent?: ISourceNode | IProcessorNode): void {
    if (this.outputList.includes(output)) {
      throw new ProtocolViolationError(
        'duplicate-node',
        `Trying to add a ${output.type} that has already been added`,
        output.id
      );
    }
    if (
      parent &&
      parent !== this.currentSource &&
      !(isProcessorNode(parent) && this.processorList.includes(parent))
    ) {
      throw new ProtocolViolationError(
        'unknown-node',
        `Parent '${parent.id}' of output '${output.id}' is not part of pipeline ${this.id}`,
        output.id
      );
    }

    this.graph.add(output);
    this.outputList.push(output);
    this.outputParents.set(output.id, parent ?? null);

    const target = parent ?? this.lastNodeBeforeOutputs();
    if (target) {
      this.graph.connect(output, target);
    }

    this.logger.logEvent('pipeline', 'output-added', {
      pipelineId: this.id,
      nodeId: output.id,
      parentId: parent?.id ?? null,
    });
    this.hookManager.emit(PipelineEventType.NODE_ADDED, output);
  }

  removeOutput(output: IOutputNode): void {
    const position = this.outputList.indexOf(output);
    if (position < 0) {
      throw new ProtocolViolationError(
        'unknown-node',
        `${output.type} '${output.id}' is not part of pipeline ${this.id}`,
        output.id
      );
    }
    this.outputList.splice(position, 1);
    this.outputParents.delete(output.id);
    this.graph.remove(output);
    this.hookManager.emit(PipelineEventType.NODE_REMOVED, output);
  }

  /**
   * Initializes the source and, through it, every node downstream
   * @throws ProtocolViolationError if no source has been set
   */
  initializeAll(): void {
    const source = this.requireSource();
    const start = performance.now();
    this.logger.measureTime('pipeline', 'initialize', () => source.chainInitialize(), {
      pipelineId: this.id,
      nodeCount: this.graph.size,
    });
    this.hookManager.emit(PipelineEventType.INITIALIZED, performance.now() - start);
  }

  /**
   * One synchronous pass: every node updates once, upstream before downstream.
   * Errors propagate after the TICK_FAILED event.
   */
  tick(): TickReport {
    const tick = this.tickCount + 1;
    const start = performance.now();
    const nodes = this.graph.topologicalOrder();

    try {
      for (const node of nodes) {
        node.update();
      }
    } catch (error) {
      this.tickCount = tick;
      this.logger.logEvent('pipeline', 'tick:error', {
        pipelineId: this.id,
        tick,
        error: getErrorMessage(error),
      });
      this.hookManager.emit(PipelineEventType.TICK_FAILED, tick, error);
      throw error;
    }

    const durationMs = performance.now() - start;
    this.tickCount = tick;
    this.lastTickDurationMs = durationMs;

    const report: TickReport = { tick, durationMs, nodeCount: nodes.length };
    this.logger.debug(`Pipeline ${this.id} tick ${tick} finished in ${durationMs.toFixed(1)} ms`);
    this.hookManager.emit(PipelineEventType.TICK_COMPLETED, report);
    return report;
  }

  /**
   * Ticks periodically while the source is alive.
   *
   * Nothing happens until subscription. The pipeline is initialized first if
   * its source is not; a failing tick errors the stream.
   *
   * @param intervalMs Period between ticks, `tickIntervalMs` option by default
   * @param scheduler Scheduler driving the period
   */
  run(
    intervalMs: number = this.options.tickIntervalMs,
    scheduler: SchedulerLike = asyncScheduler
  ): Observable<TickReport> {
    return defer(() => {
      const source = this.requireSource();
      if (!source.initialized) {
        this.initializeAll();
      }
      return interval(intervalMs, scheduler).pipe(
        takeWhile(() => this.currentSource?.isAlive ?? false),
        map(() => this.tick())
      );
    });
  }

  /**
   * Subscribe to a pipeline event
   * @returns Function to unsubscribe
   */
  on<K extends keyof PipelineEventHandlers>(
    eventType: K,
    handler: PipelineEventHandlers[K]
  ): UnsubscribeFn {
    return this.hookManager.on(eventType, handler);
  }

  /**
   * Serializable view of every node, in chain order
   */
  describe(): PipelineSnapshot {
    const nodes = this.allNodes.map(
      (node): NodeSnapshot => ({
        id: node.id,
        type: node.type,
        role: node.role,
        state: node.lifecycleState,
        upstreamId: node.upstream?.id ?? null,
        disabled: node.role === 'source' ? false : node.disabled,
      })
    );
    return {
      pipelineId: this.id,
      samplingRate: this.currentSource?.channelInfo?.samplingRate ?? null,
      nodes,
    };
  }

  getStats(): PipelineStats {
    const nodes = this.allNodes;
    return {
      pipelineId: this.id,
      tickCount: this.tickCount,
      nodeCount: nodes.length,
      initializedCount: nodes.filter(node => node.initialized).length,
      lastTickDurationMs: this.lastTickDurationMs,
    };
  }

  private lastNodeBeforeOutputs(): ISourceNode | IProcessorNode | null {
    return this.processorList[this.processorList.length - 1] ?? this.currentSource;
  }

  /**
   * Re-points outputs to their requested parent, floating ones to the tail
   */
  private reconnectOutputs(): void {
    const tail = this.lastNodeBeforeOutputs();
    for (const output of this.outputList) {
      const target = this.outputParents.get(output.id) ?? tail;
      if (target) {
        this.graph.connect(output, target);
      }
    }
  }

  private requireSource(): ISourceNode {
    if (!this.currentSource) {
      throw new ProtocolViolationError(
        'missing-source',
        `No source has been set in pipeline ${this.id}`,
        this.id
      );
    }
    return this.currentSource;
  }
}
