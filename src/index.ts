export * from './contracts'
export * from './errors/AuditErrors'
export { createRecord, getRecordField, toSerializedRecord, fromSerializedRecord } from './record/AuditRecord'
export { buildRecord } from './record/RecordBuilder'
export type { BuildOptions } from './record/RecordBuilder'
export {
  hashFile,
  resolveHashAlgorithm,
  HASH_ALGORITHMS,
  DEFAULT_HASH_ALGORITHM,
  DEFAULT_CHUNK_SIZE,
} from './hashing/FileHasher'
export { walkFiles, isIgnored } from './walker/FileWalker'
export type { WalkOptions } from './walker/FileWalker'
export { Snapshot } from './snapshot/Snapshot'
export { resolveSuperset } from './snapshot/SupersetResolver'
export { groupDiff } from './diff/DiffGrouper'
export type { GroupedEntry } from './diff/DiffGrouper'
export { diffSnapshots, renderDiffReport, DEFAULT_INTERESTING_KEYS } from './diff/SnapshotDiff'
export type { DiffRow, DiffOptions } from './diff/SnapshotDiff'
export { Auditor } from './audit/Auditor'
export type { AuditOptions } from './audit/Auditor'
export * from './formatting'
export type { SnapshotStore } from './storage/Storage'
export { FileSnapshotStore } from './storage/FileStorage'
export { MemorySnapshotStore } from './storage/MemoryStorage'
export { ConfigLoader } from './config/ConfigLoader'
export { run, createContext } from './cli/runner'
