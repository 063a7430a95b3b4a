import {
  IHookManager,
  PipelineEventHandlers,
  PipelineEventType,
  UnsubscribeFn,
} from '../types/pipeline-hooks';
import type { ILogger } from '../types/logger';
import { LoggerManager } from '../utils/logging';

// Type for any event handler - union of all possible event handlers
type AnyEventHandler = PipelineEventHandlers[keyof PipelineEventHandlers];

/**
 * Hook manager for pipelines.
 * Provides ability to register/cancel hooks and support for multiple handlers.
 * A failing handler is logged and does not affect the pipeline or other handlers.
 */
export class HookManager implements IHookManager {
  private readonly handlers = new Map<keyof PipelineEventHandlers, Set<AnyEventHandler>>();

  constructor(private readonly logger?: ILogger) {
    Object.values(PipelineEventType).forEach(eventType => {
      this.handlers.set(eventType, new Set());
    });
  }

  /**
   * Registers handler for specified event
   * @returns Function to cancel registration
   */
  public on<K extends keyof PipelineEventHandlers>(
    eventType: K,
    handler: PipelineEventHandlers[K]
  ): UnsubscribeFn {
    const handlers = this.handlers.get(eventType);

    if (!handlers) {
      this.resolveLogger().warn(`Attempt to subscribe to unknown event: ${String(eventType)}`);
      return () => {
        /* Empty unsubscribe function */
      };
    }

    handlers.add(handler);

    return () => {
      handlers.delete(handler);
    };
  }

  /**
   * Calls all handlers for specified event
   */
  public emit<K extends keyof PipelineEventHandlers>(
    eventType: K,
    ...args: Parameters<PipelineEventHandlers[K]>
  ): void {
    const handlers = this.handlers.get(eventType);

    if (!handlers || handlers.size === 0) {
      return;
    }

    handlers.forEach(handler => {
      try {
        Reflect.apply(handler, undefined, args);
      } catch (error) {
        this.resolveLogger().error(
          `Error in event handler ${String(eventType)}`,
          error instanceof Error ? error : String(error)
        );
      }
    });
  }

  public clearEvent(eventType: keyof PipelineEventHandlers): void {
    this.handlers.get(eventType)?.clear();
  }

  public clearAllEvents(): void {
    this.handlers.forEach(handlers => handlers.clear());
  }

  /**
   * Checks if there are handlers for specified event
   */
  public hasHandlers(eventType: keyof PipelineEventHandlers): boolean {
    const handlers = this.handlers.get(eventType);
    return !!handlers && handlers.size > 0;
  }

  private resolveLogger(): ILogger {
    return this.logger ?? LoggerManager.getInstance().getLogger();
  }
}
