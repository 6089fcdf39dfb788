import { AuditRecord, FieldValue, RecordKey, RECORD_KEYS, SerializedRecord, SerializedRecordSchema } from '../contracts'
import { SnapshotFormatError } from '../errors/AuditErrors'

export function createRecord(fields: AuditRecord): AuditRecord {
  return Object.freeze({
    name: fields.name,
    path: fields.path,
    permissionMode: fields.permissionMode,
    ownerId: fields.ownerId,
    groupId: fields.groupId,
    sizeBytes: fields.sizeBytes,
    accessTime: fields.accessTime,
    modifyTime: fields.modifyTime,
    changeTime: fields.changeTime,
    hash: fields.hash,
  })
}

function assertNever(value: never): never {
  throw new Error(`Unhandled record key: ${String(value)}`)
}

export function getRecordField(record: AuditRecord, key: RecordKey): FieldValue {
  switch (key) {
    case 'name':
      return record.name
    case 'path':
      return record.path
    case 'mode':
      return record.permissionMode
    case 'uid':
      return record.ownerId
    case 'gid':
      return record.groupId
    case 'size':
      return record.sizeBytes
    case 'atime':
      return record.accessTime
    case 'mtime':
      return record.modifyTime
    case 'ctime':
      return record.changeTime
    case 'hash':
      return record.hash
    default:
      return assertNever(key)
  }
}

export function toSerializedRecord(record: AuditRecord): SerializedRecord {
  return {
    name: record.name,
    path: record.path,
    mode: record.permissionMode,
    uid: record.ownerId,
    gid: record.groupId,
    size: record.sizeBytes,
    atime: record.accessTime,
    mtime: record.modifyTime,
    ctime: record.changeTime,
    hash: record.hash,
  }
}

/**
 * Rebuild a record from its persisted dictionary. The stored hash is trusted
 * as-is; nothing is read from disk.
 */
export function fromSerializedRecord(raw: unknown, position?: number): AuditRecord {
  const parsed = SerializedRecordSchema.safeParse(raw)
  if (!parsed.success) {
    const where = position === undefined ? 'record' : `record ${position}`
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new SnapshotFormatError(`Malformed ${where}: ${issues}`, parsed.error.errors)
  }

  const data = parsed.data
  return createRecord({
    name: data.name,
    path: data.path,
    permissionMode: data.mode,
    ownerId: data.uid,
    groupId: data.gid,
    sizeBytes: data.size,
    accessTime: data.atime,
    modifyTime: data.mtime,
    changeTime: data.ctime,
    hash: data.hash,
  })
}

export function toFieldList(record: AuditRecord): FieldValue[] {
  return RECORD_KEYS.map((key) => getRecordField(record, key))
}
