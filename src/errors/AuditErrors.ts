export class AuditError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown,
  ) {
    super(message)
    this.name = 'AuditError'
  }
}

/**
 * A path could not be stat'd, read or listed. Raised as-is; callers choose
 * whether to skip or abort.
 */
export class FileAccessError extends AuditError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(
      `Cannot access ${filePath}: ${describeCause(cause)}`,
      'FILE_ACCESS_ERROR',
      { errno: errnoCode(cause) },
    )
    this.name = 'FileAccessError'
  }
}

export class SnapshotFormatError extends AuditError {
  constructor(message: string, details?: unknown) {
    super(message, 'SNAPSHOT_FORMAT_ERROR', details)
    this.name = 'SnapshotFormatError'
  }
}

export class TemplateError extends AuditError {
  constructor(message: string, details?: unknown) {
    super(message, 'TEMPLATE_ERROR', details)
    this.name = 'TemplateError'
  }
}

export class UsageError extends AuditError {
  constructor(message: string, details?: unknown) {
    super(message, 'USAGE_ERROR', details)
    this.name = 'UsageError'
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return undefined
}
