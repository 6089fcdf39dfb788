import { Command } from './types'
import { CommandResult, RECORD_KEYS } from '../contracts'
import { HASH_ALGORITHMS, DEFAULT_HASH_ALGORITHM } from '../hashing/FileHasher'

export const HelpCommand: Command = {
  name: 'help',
  aliases: ['--help', '-h'],
  description: 'Show available commands',
  usage: 'fsaudit help',
  execute: async (context): Promise<CommandResult> => {
    context.stdout('fsaudit - file system audit tool')
    context.stdout('')
    context.stdout('Commands:')
    for (const command of context.registry.getAll()) {
      context.stdout(`  ${command.name.padEnd(10)}${command.description}`)
      context.stdout(`  ${''.padEnd(10)}${command.usage}`)
    }
    context.stdout('')
    context.stdout(`Template placeholders: ${RECORD_KEYS.map((key) => `{${key}}`).join(' ')}`)
    context.stdout(`Hash algorithms: ${HASH_ALGORITHMS.join(', ')} (default ${DEFAULT_HASH_ALGORITHM})`)
    return { exitCode: 0 }
  },
}
