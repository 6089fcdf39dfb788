import { Command, CommandRegistry as ICommandRegistry, ResolvedCommand } from './types'
import { UsageError } from '../errors/AuditErrors'
import { AuditCommand } from './AuditCommand'
import { DiffCommand } from './DiffCommand'
import { VersionCommand } from './VersionCommand'
import { HelpCommand } from './HelpCommand'

export const defaultCommands: readonly Command[] = [AuditCommand, DiffCommand, VersionCommand, HelpCommand]

export interface RegistryRouting {
  // Runs when argv is empty
  emptyCommand?: string
  // Receives the whole argv when its first word names no command
  fallbackCommand?: string
}

export class CommandRegistry implements ICommandRegistry {
  // Names and aliases share one namespace, so `--diff` and `-V` route like words
  private commands: Map<string, Command> = new Map()
  private routing: Required<RegistryRouting>

  constructor(routing: RegistryRouting = {}) {
    this.routing = {
      emptyCommand: routing.emptyCommand ?? HelpCommand.name,
      fallbackCommand: routing.fallbackCommand ?? AuditCommand.name,
    }
  }

  register(command: Command): void {
    this.commands.set(command.name.toLowerCase(), command)

    for (const alias of command.aliases ?? []) {
      this.commands.set(alias.toLowerCase(), command)
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name.toLowerCase())
  }

  /**
   * Commands in registration order, once each
   */
  getAll(): Command[] {
    return Array.from(new Set(this.commands.values()))
  }

  /**
   * Pick the command for argv. `fsaudit PATH...` is an audit, so a first word
   * that names no command keeps its place among the arguments.
   */
  resolve(argv: readonly string[]): ResolvedCommand {
    const [first, ...rest] = argv

    if (first === undefined) {
      return { command: this.require(this.routing.emptyCommand), args: [] }
    }

    const named = this.get(first)
    if (named) {
      return { command: named, args: rest }
    }
    return { command: this.require(this.routing.fallbackCommand), args: [...argv] }
  }

  private require(name: string): Command {
    const command = this.get(name)
    if (!command) {
      throw new UsageError(`No "${name}" command is registered`)
    }
    return command
  }

  static createWithDefaults(commands: readonly Command[] = defaultCommands): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}
