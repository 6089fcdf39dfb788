import { UsageError } from '../errors/AuditErrors'

/**
 * Wrap a util.parseArgs failure (unknown flag, missing value) as a usage
 * error carrying the command's usage line.
 */
export function toUsageError(error: unknown, usage: string): UsageError {
  const message = error instanceof Error ? error.message : String(error)
  return new UsageError(`${message}\nUsage: ${usage}`)
}
