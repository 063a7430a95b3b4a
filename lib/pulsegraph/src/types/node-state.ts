/**
 * Lifecycle state of a node as seen from outside.
 * Pending states are listed in the order they are resolved.
 */
export enum NodeLifecycleState {
  /**
   * `initialize` has not completed since construction or since it last failed
   */
  UNINITIALIZED = 'uninitialized',

  /**
   * Ready; the next update runs the node's computation
   */
  INITIALIZED = 'initialized',

  /**
   * Upstream drift or a new upstream; the next update rebuilds everything
   */
  PENDING_REINITIALIZE = 'pending-reinitialize',

  /**
   * A reset-triggering attribute changed
   */
  PENDING_RESET = 'pending-reset',

  /**
   * Upstream reported that its output history is no longer valid
   */
  PENDING_HISTORY_INVALIDATION = 'pending-history-invalidation',
}

/**
 * Outstanding work of a node
 */
export interface PendingFlags {
  readonly reinitialize: boolean;
  readonly reset: boolean;
  readonly inputHistoryInvalid: boolean;
  /** A message marked "changed" arrived and has not been examined yet */
  readonly upstreamChanged: boolean;
}
