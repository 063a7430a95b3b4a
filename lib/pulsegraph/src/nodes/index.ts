export { ChunkSource } from './chunk-source';
export type { ChunkSourceParams } from './chunk-source';
export { TransformProcessor } from './transform-processor';
export type { ChunkTransform, TransformProcessorParams } from './transform-processor';
export { EnvelopeExtractor, ENVELOPE_METHODS } from './envelope-extractor';
export type { EnvelopeExtractorParams, EnvelopeMethod } from './envelope-extractor';
export { ChannelStatistics } from './channel-statistics';
export type { ChannelStatisticsParams } from './channel-statistics';
export { LinearProjection, PROJECTION_METHODS } from './linear-projection';
export type {
  LinearProjectionParams,
  OperatorFactory,
  ProjectionMethod,
  ProjectionOperator,
  ProjectionSettings,
} from './linear-projection';
export { ChunkRecorder } from './chunk-recorder';
export type { ChunkRecorderParams } from './chunk-recorder';
export { StreamOutput } from './stream-output';
