import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when FSAUDIT_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.FSAUDIT_DEBUG === 'true' || process.env.FSAUDIT_DEBUG === '1'

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const fsauditDir = join(homedir(), '.fsaudit')
  const logPath = join(fsauditDir, 'debug.log')

  // Ensure directory exists
  mkdirSync(fsauditDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
