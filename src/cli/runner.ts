import { CommandRegistry, CommandContext } from '../commands'
import { ConfigLoader } from '../config/ConfigLoader'
import { AuditError } from '../errors/AuditErrors'
import { debugLog, errorMessage } from '../logging/debugLog'
import { FileSnapshotStore } from '../storage/FileStorage'

export function createContext(overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    configLoader: overrides.configLoader ?? new ConfigLoader(),
    store: overrides.store ?? new FileSnapshotStore(),
    registry: overrides.registry ?? CommandRegistry.createWithDefaults(),
    stdout: overrides.stdout ?? ((line) => process.stdout.write(`${line}\n`)),
    stderr: overrides.stderr ?? ((line) => process.stderr.write(`${line}\n`)),
  }
}

/**
 * Dispatch argv to a command and return the process exit code. A first
 * argument that names no command is treated as the start of an audit.
 */
export async function run(argv: string[], context: CommandContext = createContext()): Promise<number> {
  let commandName: string | undefined

  try {
    const { command, args } = context.registry.resolve(argv)
    commandName = command.name
    debugLog({ event: 'command_start', command: commandName, args })

    const result = await command.execute(context, args)
    if (result.message) {
      context.stdout(result.message)
    }
    return result.exitCode
  } catch (error) {
    debugLog({ event: 'command_failed', command: commandName, error: errorMessage(error) })
    if (error instanceof AuditError) {
      context.stderr(`fsaudit: ${error.message}`)
      return 1
    }
    context.stderr(`fsaudit: unexpected error: ${errorMessage(error)}`)
    return 2
  }
}
