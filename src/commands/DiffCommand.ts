import { parseArgs } from 'util'
import { Command } from './types'
import { toUsageError } from './parseCommandArgs'
import { CommandResult } from '../contracts'
import { diffSnapshots, renderDiffReport } from '../diff/SnapshotDiff'
import { UsageError } from '../errors/AuditErrors'
import { Snapshot } from '../snapshot/Snapshot'

const USAGE = 'fsaudit diff SNAPSHOT SNAPSHOT...'

export const DiffCommand: Command = {
  name: 'diff',
  aliases: ['--diff'],
  description: 'Compare previously saved audit snapshots (JSON or CSV)',
  usage: USAGE,
  execute: async (context, args): Promise<CommandResult> => {
    let locations: string[]
    try {
      locations = parseArgs({ args, allowPositionals: true, strict: true, options: {} }).positionals
    } catch (error) {
      throw toUsageError(error, USAGE)
    }

    if (locations.length < 2) {
      throw new UsageError(`At least two snapshots are required\nUsage: ${USAGE}`)
    }

    const { primaryKey, interestingKeys } = context.configLoader.getConfig().diff

    // Every snapshot must load before anything is printed
    const snapshots: Snapshot[] = []
    for (const location of locations) {
      snapshots.push(await context.store.load(location, primaryKey))
    }

    const rows = diffSnapshots(snapshots, { primaryKey, interestingKeys })
    for (const line of renderDiffReport(locations, interestingKeys, rows)) {
      context.stdout(line)
    }

    return { exitCode: 0 }
  },
}
