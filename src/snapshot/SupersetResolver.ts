import { FieldValue, RecordKey } from '../contracts'
import { Snapshot } from './Snapshot'

/**
 * Ordered union of the values of `primaryKey` across snapshots. Each value
 * appears once, in the order it was first seen walking the snapshots left to
 * right.
 */
export function resolveSuperset<K extends RecordKey>(
  snapshots: readonly Snapshot<K>[],
  primaryKey: K
): FieldValue[] {
  const values = new Set<FieldValue>()

  for (const snapshot of snapshots) {
    for (const value of snapshot.getIndex(primaryKey).keys()) {
      values.add(value)
    }
  }

  return Array.from(values)
}
