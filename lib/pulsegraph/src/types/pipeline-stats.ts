import type { NodeRole } from './node-api';
import type { NodeLifecycleState } from './node-state';

/**
 * Result of one pass over the pipeline
 */
export interface TickReport {
  /** 1-based tick number */
  readonly tick: number;
  readonly durationMs: number;
  readonly nodeCount: number;
}

/**
 * Pipeline counters
 */
export interface PipelineStats {
  readonly pipelineId: string;
  readonly tickCount: number;
  readonly nodeCount: number;
  readonly initializedCount: number;
  readonly lastTickDurationMs: number | null;
}

/**
 * Serializable view of one node
 */
export interface NodeSnapshot {
  readonly id: string;
  readonly type: string;
  readonly role: NodeRole;
  readonly state: NodeLifecycleState;
  readonly upstreamId: string | null;
  readonly disabled: boolean;
}

/**
 * Serializable view of a pipeline, nodes in chain order
 */
export interface PipelineSnapshot {
  readonly pipelineId: string;
  readonly samplingRate: number | null;
  readonly nodes: readonly NodeSnapshot[];
}
