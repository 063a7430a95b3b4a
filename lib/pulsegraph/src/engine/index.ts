export { Node } from './node';
export type { NodeLifecycleEvent } from './node';
export { SourceNode, ProcessorNode, OutputNode } from './roles';
export { Message, FULL_INVALIDATION, createMessage } from './message';
export { NodeRegistry } from './registry';
export { HookManager } from './hook-manager';
