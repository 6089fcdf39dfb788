import { RecordKey, SnapshotFormat } from '../contracts'
import { FileAccessError } from '../errors/AuditErrors'
import { Snapshot } from '../snapshot/Snapshot'
import { deserializeRecords, serializeRecords } from './serialization'
import { formatForLocation, SnapshotStore } from './Storage'

/**
 * Keeps serialized snapshot text in memory, keyed by location
 */
export class MemorySnapshotStore implements SnapshotStore {
  private data: Map<string, string> = new Map()

  async load<K extends RecordKey>(
    location: string,
    indexKeys: K | readonly K[],
    format: SnapshotFormat = formatForLocation(location)
  ): Promise<Snapshot<K>> {
    const text = this.data.get(location)
    if (text === undefined) {
      throw new FileAccessError(location, new Error('no such snapshot'))
    }
    return new Snapshot(indexKeys, location).addAll(deserializeRecords(text, format))
  }

  async save<K extends RecordKey>(
    snapshot: Snapshot<K>,
    location: string,
    format: SnapshotFormat = formatForLocation(location)
  ): Promise<void> {
    this.data.set(location, serializeRecords(snapshot.records, format))
  }

  getRaw(location: string): string | undefined {
    return this.data.get(location)
  }

  setRaw(location: string, text: string): void {
    this.data.set(location, text)
  }
}
