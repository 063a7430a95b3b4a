/**
 * Utility types shared across pulsegraph
 */

/**
 * JSON-compatible scalar
 */
export type SerializableValue = string | number | boolean | null | undefined;

/**
 * Serializable type (no functions, symbols, typed arrays, etc.)
 */
export type Serializable =
  | SerializableValue
  | readonly Serializable[]
  | { readonly [key: string]: Serializable };

/**
 * Value that can be compared structurally when checking upstream drift.
 * Mutable upstream objects must be reduced to one of these first.
 */
export type SnapshotValue = SerializableValue | readonly SnapshotValue[];
