import { FieldValue, RecordKey, SnapshotEntry } from '../contracts'
import { Snapshot } from '../snapshot/Snapshot'
import { resolveSuperset } from '../snapshot/SupersetResolver'
import { groupDiff, GroupedEntry } from './DiffGrouper'

export const DEFAULT_INTERESTING_KEYS: readonly RecordKey[] = ['hash', 'size']

export interface DiffOptions<K extends RecordKey> {
  primaryKey: K
  interestingKeys?: readonly RecordKey[]
}

export interface DiffRow {
  key: FieldValue
  // One result per snapshot, in snapshot order
  results: GroupedEntry[]
}

export function diffSnapshots<K extends RecordKey>(
  snapshots: readonly Snapshot<K>[],
  options: DiffOptions<K>
): DiffRow[] {
  const interestingKeys = options.interestingKeys ?? DEFAULT_INTERESTING_KEYS

  return resolveSuperset(snapshots, options.primaryKey).map((key) => {
    const entries = snapshots.map((snapshot): SnapshotEntry => {
      const record = snapshot.get(options.primaryKey, key)
      return record ? { kind: 'present', record } : { kind: 'absent' }
    })
    return { key, results: groupDiff(interestingKeys, entries) }
  })
}

const NAME_WIDTH = 40
const GROUP_WIDTH = 10

const padEnd = (text: string, width: number): string => text.padEnd(width)

// Odd padding goes to the right
function center(text: string, width: number): string {
  const padding = Math.max(0, width - text.length)
  const left = Math.floor(padding / 2)
  return ' '.repeat(left) + text + ' '.repeat(padding - left)
}

/**
 * Fixed-width report: one row per (key, snapshot), with a blank line after
 * each key's rows.
 */
export function renderDiffReport(
  snapshotNames: readonly string[],
  interestingKeys: readonly RecordKey[],
  rows: readonly DiffRow[]
): string[] {
  const lines: string[] = ['']

  const keyHeader = interestingKeys.map((key) => center(key, GROUP_WIDTH)).join('')
  lines.push(`${padEnd('File @ Archive', NAME_WIDTH)}${keyHeader}${center('sum', GROUP_WIDTH)}`)

  for (const row of rows) {
    row.results.forEach((result, i) => {
      const rowName = `${row.key} @ ${snapshotNames[i] ?? `#${i}`}`
      const groupText = interestingKeys
        .map((key) => center(String(result.groups.get(key) ?? ''), GROUP_WIDTH))
        .join('')
      lines.push(`${padEnd(rowName, NAME_WIDTH)}${groupText}${center(String(result.group), GROUP_WIDTH)}`)
    })
    lines.push('')
  }

  return lines
}
