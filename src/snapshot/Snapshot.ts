import { AuditRecord, FieldValue, RecordKey } from '../contracts'
import { getRecordField } from '../record/AuditRecord'

/**
 * Ordered collection of records from one audit run, indexed by one or more
 * record keys.
 *
 * Only one record is kept per indexed value: when two records share a value
 * the later one wins, while the value keeps its first-seen position in the
 * index.
 */
export class Snapshot<K extends RecordKey = RecordKey> {
  readonly name?: string
  readonly indexKeys: readonly K[]
  private entries: AuditRecord[] = []
  private indexes: Map<K, Map<FieldValue, AuditRecord>>

  constructor(indexKeys: K | readonly K[], name?: string) {
    this.name = name
    const keys: K[] = []
    this.indexKeys = keys.concat(indexKeys)
    this.indexes = new Map(this.indexKeys.map((key) => [key, new Map<FieldValue, AuditRecord>()]))
  }

  add(record: AuditRecord): void {
    this.entries.push(record)

    for (const [key, index] of this.indexes) {
      index.set(getRecordField(record, key), record)
    }
  }

  addAll(records: Iterable<AuditRecord>): this {
    for (const record of records) {
      this.add(record)
    }
    return this
  }

  get records(): readonly AuditRecord[] {
    return this.entries
  }

  get size(): number {
    return this.entries.length
  }

  /**
   * Look up a record by indexed value; a missing value is `undefined`, not an
   * error.
   */
  get(key: K, value: FieldValue): AuditRecord | undefined {
    return this.getIndex(key).get(value)
  }

  getIndex(key: K): ReadonlyMap<FieldValue, AuditRecord> {
    const index = this.indexes.get(key)
    if (!index) {
      throw new Error(`Snapshot is not indexed by "${key}" (indexed: ${this.indexKeys.join(', ')})`)
    }
    return index
  }
}
