import { promises as fs } from 'fs'
import path from 'path'
import { RecordKey, SnapshotFormat } from '../contracts'
import { FileAccessError, SnapshotFormatError } from '../errors/AuditErrors'
import { debugLog, errorMessage } from '../logging/debugLog'
import { Snapshot } from '../snapshot/Snapshot'
import { deserializeRecords, serializeRecords } from './serialization'
import { formatForLocation, SnapshotStore } from './Storage'

export class FileSnapshotStore implements SnapshotStore {
  async load<K extends RecordKey>(
    location: string,
    indexKeys: K | readonly K[],
    format: SnapshotFormat = formatForLocation(location)
  ): Promise<Snapshot<K>> {
    let text: string
    try {
      text = await fs.readFile(location, 'utf8')
    } catch (error) {
      throw new FileAccessError(location, error)
    }

    try {
      const records = deserializeRecords(text, format)
      debugLog({ event: 'snapshot_loaded', location, format, recordCount: records.length })
      return new Snapshot(indexKeys, location).addAll(records)
    } catch (error) {
      debugLog({ event: 'snapshot_load_failed', location, format, error: errorMessage(error) })
      if (error instanceof SnapshotFormatError) {
        throw new SnapshotFormatError(`${location}: ${error.message}`, error.details)
      }
      throw error
    }
  }

  async save<K extends RecordKey>(
    snapshot: Snapshot<K>,
    location: string,
    format: SnapshotFormat = formatForLocation(location)
  ): Promise<void> {
    const dir = path.dirname(location)
    try {
      await fs.mkdir(dir, { recursive: true })
      await fs.writeFile(location, serializeRecords(snapshot.records, format), 'utf8')
    } catch (error) {
      throw new FileAccessError(location, error)
    }
    debugLog({ event: 'snapshot_saved', location, format, recordCount: snapshot.size })
  }
}
