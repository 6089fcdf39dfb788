import crypto from 'crypto'
import { promises as fs } from 'fs'
import { HashAlgorithm, HashAlgorithmSchema } from '../contracts'

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = HashAlgorithmSchema.options

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256'

// 128MiB; bounds peak memory for arbitrarily large files
export const DEFAULT_CHUNK_SIZE = 128 * 1024 * 1024

export interface ResolvedAlgorithm {
  algorithm: HashAlgorithm
  fellBack: boolean
}

/**
 * Unknown names degrade to sha256 instead of failing; `fellBack` lets the
 * caller warn about it.
 */
export function resolveHashAlgorithm(name?: string): ResolvedAlgorithm {
  if (name === undefined) {
    return { algorithm: DEFAULT_HASH_ALGORITHM, fellBack: false }
  }

  const parsed = HashAlgorithmSchema.safeParse(name.toLowerCase())
  if (parsed.success) {
    return { algorithm: parsed.data, fellBack: false }
  }

  return { algorithm: DEFAULT_HASH_ALGORITHM, fellBack: true }
}

/**
 * Hash a file's content, reading at most `chunkSize` bytes at a time.
 * A new digest is created for every call.
 */
export async function hashFile(
  filePath: string,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Promise<string> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`)
  }

  const digest = crypto.createHash(algorithm)
  const handle = await fs.open(filePath, 'r')

  try {
    const { size } = await handle.stat()
    const buffer = Buffer.alloc(Math.max(1, Math.min(chunkSize, size)))

    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null)
      if (bytesRead === 0) {
        break
      }
      digest.update(buffer.subarray(0, bytesRead))
    }
  } finally {
    await handle.close()
  }

  return digest.digest('hex')
}
