import { v4 as uuidv4 } from 'uuid'
import { AuditRecord, ErrorPolicy, HashAlgorithm, RecordKey } from '../contracts'
import { FileAccessError } from '../errors/AuditErrors'
import { DEFAULT_CHUNK_SIZE, DEFAULT_HASH_ALGORITHM } from '../hashing/FileHasher'
import { debugLog } from '../logging/debugLog'
import { buildRecord } from '../record/RecordBuilder'
import { Snapshot } from '../snapshot/Snapshot'
import { isDirectory, walkFiles } from '../walker/FileWalker'

export interface AuditOptions {
  recursive?: boolean
  ignore?: readonly string[]
  algorithm?: HashAlgorithm
  chunkSize?: number
  errorPolicy?: ErrorPolicy
  // Skip directory roots entirely when several roots are given without recursion
  legacyMultiRootSkip?: boolean
  // Receives each failure under the 'skip' policy
  onSkip?: (error: FileAccessError) => void
}

export class Auditor {
  readonly runId: string = uuidv4()
  private options: Required<Omit<AuditOptions, 'onSkip'>> & Pick<AuditOptions, 'onSkip'>

  constructor(options: AuditOptions = {}) {
    this.options = {
      recursive: options.recursive ?? false,
      ignore: options.ignore ?? [],
      algorithm: options.algorithm ?? DEFAULT_HASH_ALGORITHM,
      chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
      errorPolicy: options.errorPolicy ?? 'abort',
      legacyMultiRootSkip: options.legacyMultiRootSkip ?? false,
      onSkip: options.onSkip,
    }
  }

  /**
   * Yield one record per selected file, strictly in walk order. Each file is
   * hashed to completion before the next path is visited.
   */
  async *audit(roots: readonly string[]): AsyncGenerator<AuditRecord> {
    const { recursive, ignore, algorithm, chunkSize, legacyMultiRootSkip } = this.options
    const multiRoot = roots.length > 1
    let count = 0

    debugLog({ event: 'audit_start', runId: this.runId, roots, recursive, algorithm, ignore })

    for (const root of roots) {
      if (legacyMultiRootSkip && multiRoot && !recursive && isDirectory(root)) {
        debugLog({ event: 'root_skipped', runId: this.runId, root, reason: 'multi_root_without_recursion' })
        continue
      }

      const onError = this.options.errorPolicy === 'skip' ? this.skip.bind(this) : undefined

      for (const filePath of walkFiles(root, { recursive, ignore, onError })) {
        let record: AuditRecord
        try {
          record = await buildRecord(filePath, { algorithm, chunkSize })
        } catch (error) {
          if (onError && error instanceof FileAccessError) {
            onError(error)
            continue
          }
          debugLog({ event: 'audit_failed', runId: this.runId, filePath, count })
          throw error
        }

        count += 1
        yield record
      }
    }

    debugLog({ event: 'audit_complete', runId: this.runId, count })
  }

  /**
   * Run a full audit into a snapshot indexed by `indexKeys`.
   */
  async collect<K extends RecordKey>(
    roots: readonly string[],
    indexKeys: K | readonly K[],
    name?: string
  ): Promise<Snapshot<K>> {
    const snapshot = new Snapshot(indexKeys, name)
    for await (const record of this.audit(roots)) {
      snapshot.add(record)
    }
    return snapshot
  }

  private skip(error: FileAccessError): void {
    debugLog({ event: 'file_skipped', runId: this.runId, filePath: error.filePath, error: error.message })
    if (this.options.onSkip) {
      this.options.onSkip(error)
    } else {
      console.error(`fsaudit: skipping ${error.message}`)
    }
  }
}
