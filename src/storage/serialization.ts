import { z } from 'zod'
import { AuditRecord, SnapshotFormat } from '../contracts'
import { SnapshotFormatError } from '../errors/AuditErrors'
import { decodeCsv, encodeCsv } from '../formatting/csv'
import { fromSerializedRecord, toSerializedRecord } from '../record/AuditRecord'

const RecordArraySchema = z.array(z.unknown())

export function serializeRecords(records: Iterable<AuditRecord>, format: SnapshotFormat): string {
  switch (format) {
    case 'csv':
      return encodeCsv(records)
    case 'json':
      return JSON.stringify(Array.from(records, toSerializedRecord), null, 2)
  }
}

/**
 * Parse persisted snapshot text. Every record is validated before any is
 * returned, so a partial snapshot never escapes.
 */
export function deserializeRecords(text: string, format: SnapshotFormat): AuditRecord[] {
  if (format === 'csv') {
    return decodeCsv(text)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new SnapshotFormatError(`Invalid JSON: ${error.message}`)
    }
    throw error
  }

  const list = RecordArraySchema.safeParse(parsed)
  if (!list.success) {
    throw new SnapshotFormatError('Snapshot must be a JSON array of records')
  }

  return list.data.map((raw, i) => fromSerializedRecord(raw, i))
}
