import { CommandResult } from '../contracts'
import { ConfigLoader } from '../config/ConfigLoader'
import { SnapshotStore } from '../storage/Storage'

export interface CommandContext {
  configLoader: ConfigLoader
  store: SnapshotStore
  registry: CommandRegistry
  stdout: (line: string) => void
  stderr: (line: string) => void
}

export interface Command {
  name: string
  aliases?: string[]
  description: string
  usage: string
  execute: (context: CommandContext, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
  resolve(argv: readonly string[]): ResolvedCommand
}

export interface ResolvedCommand {
  command: Command
  args: string[]
}
