import { FieldValue, RecordKey, SnapshotEntry } from '../contracts'
import { getRecordField } from '../record/AuditRecord'

// Stands in for the value of every field of an absent entry. Never equal to
// a real field value, so a missing file never shares a group with one that
// exists.
const ABSENT: unique symbol = Symbol('absent')

type GroupValue = FieldValue | typeof ABSENT

export interface GroupedEntry {
  entry: SnapshotEntry
  // Per-key group ids, in interesting-key order
  groups: ReadonlyMap<RecordKey, number>
  // Group id of the whole tuple of per-key ids
  group: number
}

/**
 * First-seen numbering: the first distinct value gets 0, the next 1, and so
 * on.
 */
class GroupCache<T> {
  private ids = new Map<T, number>()

  idFor(value: T): number {
    const existing = this.ids.get(value)
    if (existing !== undefined) {
      return existing
    }
    const id = this.ids.size
    this.ids.set(value, id)
    return id
  }
}

/**
 * N-way comparison of entries on the interesting keys, in a single pass.
 *
 * Entries with equal values for a key share that key's group id; entries
 * with equal ids for every key share the combined group id. Ids depend only
 * on the order of `entries`.
 */
export function groupDiff(
  interestingKeys: readonly RecordKey[],
  entries: readonly SnapshotEntry[]
): GroupedEntry[] {
  const keyCaches = new Map<RecordKey, GroupCache<GroupValue>>(
    interestingKeys.map((key) => [key, new GroupCache<GroupValue>()])
  )
  const tupleCache = new GroupCache<string>()

  return entries.map((entry) => {
    const groups = new Map<RecordKey, number>()

    for (const [key, cache] of keyCaches) {
      const value: GroupValue = entry.kind === 'present' ? getRecordField(entry.record, key) : ABSENT
      groups.set(key, cache.idFor(value))
    }

    const tuple = Array.from(groups.values()).join(',')
    return { entry, groups, group: tupleCache.idFor(tuple) }
  })
}
