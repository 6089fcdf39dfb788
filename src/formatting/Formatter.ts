import { AuditRecord } from '../contracts'

/**
 * Abstract interface for per-record line formatters
 */
export interface Formatter {
  /**
   * Format one record as a single output line
   */
  format(record: AuditRecord): string
}

/**
 * Formatter configuration
 */
export interface FormatterConfig {
  /**
   * Template using {name} {path} {mode} {uid} {gid} {size} {atime} {mtime}
   * {ctime} {hash}; when absent only the path is printed
   */
  template?: string
}
