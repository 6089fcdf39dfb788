import { RecordKey, SnapshotFormat } from '../contracts'
import { Snapshot } from '../snapshot/Snapshot'

export interface SnapshotStore {
  // Load a persisted snapshot; any malformed record fails the whole load
  load<K extends RecordKey>(
    location: string,
    indexKeys: K | readonly K[],
    format?: SnapshotFormat
  ): Promise<Snapshot<K>>

  // Persist a snapshot's records in insertion order
  save<K extends RecordKey>(
    snapshot: Snapshot<K>,
    location: string,
    format?: SnapshotFormat
  ): Promise<void>
}

export const formatForLocation = (location: string): SnapshotFormat =>
  location.toLowerCase().endsWith('.csv') ? 'csv' : 'json'
