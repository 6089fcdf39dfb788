import { FormatterConfig } from './Formatter'
import { BaseFormatter, PathFormatter, TemplateFormatter } from './formatters/BaseFormatter'

/**
 * Factory for creating formatter instances based on configuration
 */
export class FormatterFactory {
  /**
   * Create a formatter instance from configuration
   * @returns A template formatter when a template is given, else a path formatter
   */
  static createFormatter(config: FormatterConfig = {}): BaseFormatter {
    if (config.template === undefined) {
      return new PathFormatter()
    }
    return new TemplateFormatter(config.template)
  }
}
