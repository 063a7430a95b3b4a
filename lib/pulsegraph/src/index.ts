// ============================================
// Engine
// ============================================
export { Node, SourceNode, ProcessorNode, OutputNode } from './engine';
export type { NodeLifecycleEvent } from './engine';
export { Message, FULL_INVALIDATION, createMessage } from './engine';
export { NodeRegistry, HookManager } from './engine';
// ============================================
// Pipeline
// ============================================
export { Pipeline, resolvePipelineOptions, DEFAULT_TICK_INTERVAL_MS } from './pipeline';
export type { ResolvedPipelineOptions } from './pipeline';
// ============================================
// Nodes
// ============================================
export {
  ChunkSource,
  TransformProcessor,
  EnvelopeExtractor,
  ENVELOPE_METHODS,
  ChannelStatistics,
  LinearProjection,
  PROJECTION_METHODS,
  ChunkRecorder,
  StreamOutput,
} from './nodes';
export type {
  ChunkSourceParams,
  ChunkTransform,
  TransformProcessorParams,
  EnvelopeExtractorParams,
  EnvelopeMethod,
  ChannelStatisticsParams,
  LinearProjectionParams,
  OperatorFactory,
  ProjectionMethod,
  ProjectionOperator,
  ProjectionSettings,
  ChunkRecorderParams,
} from './nodes';
// ============================================
// Types
// ============================================
export type {
  NodeRole,
  AttributeLookup,
  UpstreamDependency,
  INodeOptions,
  IGraphNode,
  ISourceNode,
  IProcessorNode,
  IOutputNode,
  PipelineNode,
} from './types/node-api';
export { isProcessorNode } from './types/node-api';
export type { INodeRegistry } from './types/registry-api';
export { NodeLifecycleState } from './types/node-state';
export type { PendingFlags } from './types/node-state';
export { PipelineEventType } from './types/pipeline-hooks';
export type { PipelineEventHandlers, UnsubscribeFn, IHookManager } from './types/pipeline-hooks';
export type { IPipelineOptions } from './types/pipeline-options';
export type { TickReport, PipelineStats, NodeSnapshot, PipelineSnapshot } from './types/pipeline-stats';
export { DATA_CHANNEL_TYPES } from './types/signal';
export type { SignalChunk, ReadonlyChunk, ChannelType, ChannelInfo } from './types/signal';
export type { ILogger, LogMetadata } from './types/logger';
export { LogLevel } from './types/logger';
export type { SnapshotValue, SerializableValue, Serializable } from './types/utils';
// ============================================
// Utilities
// ============================================
export {
  NodeError,
  ProtocolViolationError,
  ValidationError,
  UpstreamAttributeError,
  isNodeError,
  isProtocolViolation,
  isValidationError,
  getErrorMessage,
} from './utils/node-error';
export type { ProtocolViolationKind } from './utils/node-error';
export * from './utils/signal';
export { LoggerAdapter, ConsoleLoggerAdapter, LoggerManager } from './utils/logging';
