import { Observable, Subject } from 'rxjs';
import { OutputNode } from '../engine/roles';
import type { INodeOptions, UpstreamDependency } from '../types/node-api';
import type { ReadonlyChunk } from '../types/signal';
import { cloneChunk } from '../utils/signal/chunk';

/**
 * Hands received chunks to rxjs subscribers, e.g. a renderer or a network sink.
 * Subscribers get copies they may keep.
 */
export class StreamOutput extends OutputNode {
  readonly resetTriggers: readonly never[] = [];
  readonly upstreamDependencies: readonly UpstreamDependency[] = [];

  private readonly subject = new Subject<ReadonlyChunk>();

  constructor(options?: INodeOptions) {
    super({}, options);
  }

  get chunks$(): Observable<ReadonlyChunk> {
    return this.subject.asObservable();
  }

  /**
   * Completes `chunks$`. Later updates emit nothing.
   */
  complete(): void {
    this.subject.complete();
  }

  protected onInitialize(): void {
    // nothing to prepare
  }

  protected onUpdate(): void {
    this.subject.next(cloneChunk(this.requireInput()));
  }

  protected onReset(): boolean {
    return false;
  }

  protected onInputHistoryInvalidation(): void {
    // subscribers keep what they received
  }
}
