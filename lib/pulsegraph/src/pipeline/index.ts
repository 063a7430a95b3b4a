export { Pipeline } from './pipeline';
export { resolvePipelineOptions, DEFAULT_TICK_INTERVAL_MS } from './pipeline-options';
export type { ResolvedPipelineOptions } from './pipeline-options';
