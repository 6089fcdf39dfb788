import { AuditRecord, RecordKey, RECORD_KEYS } from '../contracts'
import { SnapshotFormatError } from '../errors/AuditErrors'
import { fromSerializedRecord, toFieldList } from '../record/AuditRecord'

const LINE_END = '\r\n'

const NUMERIC_KEYS: ReadonlySet<RecordKey> = new Set<RecordKey>(['uid', 'gid', 'size', 'atime', 'mtime', 'ctime'])

const NUMBER_PATTERN = /^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function encodeCsv(records: Iterable<AuditRecord>): string {
  const lines = [RECORD_KEYS.join(',')]
  for (const record of records) {
    lines.push(toFieldList(record).map((value) => quoteField(String(value))).join(','))
  }
  return lines.join(LINE_END) + LINE_END
}

/**
 * Split CSV text into rows of fields. Handles quoted fields with embedded
 * commas, doubled quotes and line breaks.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let quoted = false
  let i = 0

  const endRow = () => {
    row.push(field)
    rows.push(row)
    row = []
    field = ''
  }

  while (i < text.length) {
    const char = text[i]

    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i += 2
          continue
        }
        quoted = false
      } else {
        field += char
      }
      i += 1
      continue
    }

    if (char === '"') {
      quoted = true
    } else if (char === ',') {
      row.push(field)
      field = ''
    } else if (char === '\r' && text[i + 1] === '\n') {
      endRow()
      i += 1
    } else if (char === '\n' || char === '\r') {
      endRow()
    } else {
      field += char
    }
    i += 1
  }

  if (quoted) {
    throw new SnapshotFormatError('Unterminated quoted field in CSV')
  }
  if (field !== '' || row.length > 0) {
    endRow()
  }

  return rows
}

export function decodeCsv(text: string): AuditRecord[] {
  const [header, ...rows] = parseCsvRows(text)

  if (!header || header.join(',') !== RECORD_KEYS.join(',')) {
    throw new SnapshotFormatError(`CSV header must be: ${RECORD_KEYS.join(',')}`, { header })
  }

  return rows.map((fields, i) => {
    if (fields.length !== RECORD_KEYS.length) {
      throw new SnapshotFormatError(
        `CSV row ${i + 1} has ${fields.length} fields, expected ${RECORD_KEYS.length}`
      )
    }

    const raw: Record<string, string | number> = {}
    RECORD_KEYS.forEach((key, column) => {
      const value = fields[column]
      raw[key] = NUMERIC_KEYS.has(key) && NUMBER_PATTERN.test(value) ? Number(value) : value
    })
    return fromSerializedRecord(raw, i)
  })
}
