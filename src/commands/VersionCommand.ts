import { Command } from './types'
import { CommandResult } from '../contracts'
import packageJson from '../../package.json'

export const VersionCommand: Command = {
  name: 'version',
  aliases: ['--version', '-V'],
  description: 'Show fsaudit version',
  usage: 'fsaudit version',
  execute: async (context): Promise<CommandResult> => {
    context.stdout(`fsaudit v${packageJson.version}`)
    return { exitCode: 0 }
  },
}
