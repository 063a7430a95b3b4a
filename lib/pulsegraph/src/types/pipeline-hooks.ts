import type { IGraphNode, ISourceNode } from './node-api';
import type { TickReport } from './pipeline-stats';

/**
 * Types of all pipeline events
 */
export enum PipelineEventType {
  // Structure events
  SOURCE_CHANGED = 'sourceChanged',
  NODE_ADDED = 'nodeAdded',
  NODE_REMOVED = 'nodeRemoved',

  // Execution events
  INITIALIZED = 'initialized',
  TICK_COMPLETED = 'tickCompleted',
  TICK_FAILED = 'tickFailed',
}

/**
 * Handler type for each event
 */
export interface PipelineEventHandlers {
  [PipelineEventType.SOURCE_CHANGED]: (
    source: ISourceNode,
    previous: ISourceNode | null
  ) => void;
  [PipelineEventType.NODE_ADDED]: (node: IGraphNode) => void;
  [PipelineEventType.NODE_REMOVED]: (node: IGraphNode) => void;
  [PipelineEventType.INITIALIZED]: (durationMs: number) => void;
  [PipelineEventType.TICK_COMPLETED]: (report: TickReport) => void;
  [PipelineEventType.TICK_FAILED]: (tick: number, error: unknown) => void;
}

/**
 * Function type for hook unregistration
 */
export type UnsubscribeFn = () => void;

/**
 * Interface for hook management
 */
export interface IHookManager {
  /**
   * Subscribe to event with cancellation capability
   * @returns Function to unsubscribe
   */
  on<K extends keyof PipelineEventHandlers>(
    eventType: K,
    handler: PipelineEventHandlers[K]
  ): UnsubscribeFn;

  /**
   * Call all handlers for specified event
   */
  emit<K extends keyof PipelineEventHandlers>(
    eventType: K,
    ...args: Parameters<PipelineEventHandlers[K]>
  ): void;

  /**
   * Cancel all subscriptions to specified event
   */
  clearEvent(eventType: keyof PipelineEventHandlers): void;

  /**
   * Cancel all subscriptions to all events
   */
  clearAllEvents(): void;
}
