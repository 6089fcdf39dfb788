export type { Formatter, FormatterConfig } from './Formatter'
export { FormatterFactory } from './FormatterFactory'
export { BaseFormatter, PathFormatter, TemplateFormatter } from './formatters/BaseFormatter'
export { compileTemplate, renderTemplate } from './template'
export type { CompiledTemplate } from './template'
export { encodeCsv, decodeCsv, parseCsvRows } from './csv'
