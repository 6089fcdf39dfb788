import { promises as fs } from 'fs'
import path from 'path'
import { AuditRecord, HashAlgorithm } from '../contracts'
import { FileAccessError } from '../errors/AuditErrors'
import { DEFAULT_CHUNK_SIZE, DEFAULT_HASH_ALGORITHM, hashFile } from '../hashing/FileHasher'
import { createRecord } from './AuditRecord'

export interface BuildOptions {
  algorithm?: HashAlgorithm
  chunkSize?: number
}

/**
 * Stat and hash a single file. Symlinks are followed, as with stat(2).
 */
export async function buildRecord(filePath: string, options: BuildOptions = {}): Promise<AuditRecord> {
  const algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE

  try {
    const stats = await fs.stat(filePath)
    const hash = await hashFile(filePath, algorithm, chunkSize)

    // ctime has no POSIX meaning on Windows; use creation time there
    const changeTimeMs = process.platform === 'win32' ? stats.birthtimeMs : stats.ctimeMs

    return createRecord({
      name: path.basename(filePath),
      path: filePath,
      permissionMode: (stats.mode & 0o777).toString(8),
      ownerId: stats.uid,
      groupId: stats.gid,
      sizeBytes: stats.size,
      accessTime: stats.atimeMs / 1000,
      modifyTime: stats.mtimeMs / 1000,
      changeTime: changeTimeMs / 1000,
      hash,
    })
  } catch (error) {
    if (error instanceof RangeError) {
      throw error
    }
    throw new FileAccessError(filePath, error)
  }
}
