// Field names as they appear in persisted snapshots, CSV headers and templates
export const RECORD_KEYS = [
  'name',
  'path',
  'mode',
  'uid',
  'gid',
  'size',
  'atime',
  'mtime',
  'ctime',
  'hash',
] as const

export type RecordKey = (typeof RECORD_KEYS)[number]

export type FieldValue = string | number

export interface AuditRecord {
  readonly name: string
  readonly path: string
  readonly permissionMode: string
  readonly ownerId: number
  readonly groupId: number
  readonly sizeBytes: number
  readonly accessTime: number
  readonly modifyTime: number
  // Metadata change time on POSIX, creation time on Windows
  readonly changeTime: number
  readonly hash: string
}

export interface SerializedRecord {
  name: string
  path: string
  mode: string
  uid: number
  gid: number
  size: number
  atime: number
  mtime: number
  ctime: number
  hash: string
}

export type SnapshotEntry =
  | { kind: 'present'; record: AuditRecord }
  | { kind: 'absent' }

export type SnapshotFormat = 'json' | 'csv'

export type HashAlgorithm = 'md5' | 'sha1' | 'sha224' | 'sha256' | 'sha384' | 'sha512'

export type ErrorPolicy = 'abort' | 'skip'

export interface AuditConfig {
  audit: {
    algorithm: string
    recursive: boolean
    ignore: string[]
    chunkSize: number
    errorPolicy: ErrorPolicy
    legacyMultiRootSkip: boolean
  }
  diff: {
    primaryKey: RecordKey
    interestingKeys: RecordKey[]
  }
}

export interface CommandResult {
  exitCode: number
  // Lines already streamed through the context writer are not repeated here
  message?: string
}
