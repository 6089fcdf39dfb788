import { Formatter } from '../Formatter'
import { AuditRecord } from '../../contracts'
import { compileTemplate, CompiledTemplate, renderTemplate } from '../template'

/**
 * Base implementation of the Formatter interface
 */
export abstract class BaseFormatter implements Formatter {
  abstract format(record: AuditRecord): string
}

/**
 * Prints only the record's path
 */
export class PathFormatter extends BaseFormatter {
  format(record: AuditRecord): string {
    return record.path
  }
}

export class TemplateFormatter extends BaseFormatter {
  private template: CompiledTemplate

  /**
   * @throws TemplateError for unknown placeholders, at construction time
   */
  constructor(source: string) {
    super()
    this.template = compileTemplate(source)
  }

  format(record: AuditRecord): string {
    return renderTemplate(this.template, record)
  }
}
