import { parseArgs } from 'util'
import { Command } from './types'
import { toUsageError } from './parseCommandArgs'
import { CommandResult } from '../contracts'
import { Auditor } from '../audit/Auditor'
import { UsageError } from '../errors/AuditErrors'
import { FormatterFactory } from '../formatting/FormatterFactory'
import { resolveHashAlgorithm } from '../hashing/FileHasher'
import { Snapshot } from '../snapshot/Snapshot'

const USAGE =
  'fsaudit audit PATH... [-r|--recursive] [-s|--string FORMAT] [-a|--algorithm ALG] ' +
  '[-i|--ignore PATTERN]... [--json FILE] [--csv FILE]'

function parseAuditArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      strict: true,
      options: {
        recursive: { type: 'boolean', short: 'r' },
        string: { type: 'string', short: 's' },
        algorithm: { type: 'string', short: 'a' },
        ignore: { type: 'string', short: 'i', multiple: true },
        json: { type: 'string' },
        csv: { type: 'string' },
      },
    })
  } catch (error) {
    throw toUsageError(error, USAGE)
  }
}

export const AuditCommand: Command = {
  name: 'audit',
  description: 'Hash and record metadata for files under the given paths',
  usage: USAGE,
  execute: async (context, args): Promise<CommandResult> => {
    const { values, positionals: roots } = parseAuditArgs(args)
    if (roots.length === 0) {
      throw new UsageError(`At least one PATH is required\nUsage: ${USAGE}`)
    }

    const config = context.configLoader.getConfig().audit

    // Template problems are usage errors; report them before touching any file
    const formatter = FormatterFactory.createFormatter({ template: values.string })

    const requested = values.algorithm ?? config.algorithm
    const { algorithm, fellBack } = resolveHashAlgorithm(requested)
    if (fellBack) {
      context.stderr(`fsaudit: unknown hash algorithm "${requested}", using ${algorithm}`)
    }

    const auditor = new Auditor({
      recursive: values.recursive ?? config.recursive,
      ignore: [...config.ignore, ...(values.ignore ?? [])],
      algorithm,
      chunkSize: config.chunkSize,
      errorPolicy: config.errorPolicy,
      legacyMultiRootSkip: config.legacyMultiRootSkip,
      onSkip: (error) => context.stderr(`fsaudit: skipping ${error.message}`),
    })

    const exporting = values.json !== undefined || values.csv !== undefined
    const snapshot = new Snapshot('path', values.json ?? values.csv)

    for await (const record of auditor.audit(roots)) {
      context.stdout(formatter.format(record))
      if (exporting) {
        snapshot.add(record)
      }
    }

    if (values.csv !== undefined) {
      await context.store.save(snapshot, values.csv, 'csv')
    }
    if (values.json !== undefined) {
      await context.store.save(snapshot, values.json, 'json')
    }

    return { exitCode: 0 }
  },
}
