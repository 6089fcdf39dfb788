import { AuditRecord, RecordKey, RECORD_KEYS } from '../contracts'
import { TemplateError } from '../errors/AuditErrors'
import { getRecordField } from '../record/AuditRecord'

type Segment = { kind: 'text'; text: string } | { kind: 'field'; key: RecordKey }

export interface CompiledTemplate {
  source: string
  segments: readonly Segment[]
}

const isRecordKey = (name: string): name is RecordKey =>
  RECORD_KEYS.some((key) => key === name)

/**
 * Parse a template up front so that bad placeholders are reported before any
 * file is processed. `{{` and `}}` stand for literal braces.
 */
export function compileTemplate(source: string): CompiledTemplate {
  const segments: Segment[] = []
  let text = ''
  let i = 0

  while (i < source.length) {
    const char = source[i]

    if (char === '{') {
      if (source[i + 1] === '{') {
        text += '{'
        i += 2
        continue
      }

      const close = source.indexOf('}', i + 1)
      if (close === -1) {
        throw new TemplateError(`Unclosed "{" at position ${i} in template`, { source })
      }

      const name = source.slice(i + 1, close)
      if (!isRecordKey(name)) {
        throw new TemplateError(
          `Unknown placeholder "{${name}}"; expected one of ${RECORD_KEYS.map((key) => `{${key}}`).join(' ')}`,
          { source, placeholder: name }
        )
      }

      if (text) {
        segments.push({ kind: 'text', text })
        text = ''
      }
      segments.push({ kind: 'field', key: name })
      i = close + 1
      continue
    }

    if (char === '}') {
      if (source[i + 1] !== '}') {
        throw new TemplateError(`Single "}" at position ${i} in template`, { source })
      }
      text += '}'
      i += 2
      continue
    }

    text += char
    i += 1
  }

  if (text) {
    segments.push({ kind: 'text', text })
  }

  return { source, segments }
}

export function renderTemplate(template: CompiledTemplate, record: AuditRecord): string {
  return template.segments
    .map((segment) => (segment.kind === 'text' ? segment.text : String(getRecordField(record, segment.key))))
    .join('')
}
