import type { SnapshotValue } from '../../types/utils';

/**
 * Primitives and (nested) arrays of primitives can be compared structurally.
 * Anything else has to be reduced first.
 */
export function isSnapshotValue(value: unknown): value is SnapshotValue {
  if (value === null || value === undefined) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      return Array.isArray(value) && value.every(isSnapshotValue);
    default:
      return false;
  }
}

export function snapshotsEqual(a: SnapshotValue, b: SnapshotValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item: SnapshotValue, index: number) => snapshotsEqual(item, b[index]));
  }
  return Object.is(a, b);
}
