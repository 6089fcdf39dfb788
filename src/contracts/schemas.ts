import { z } from 'zod'
import { RECORD_KEYS } from './types'

export const RecordKeySchema = z.enum(RECORD_KEYS)

export const HashAlgorithmSchema = z.enum(['md5', 'sha1', 'sha224', 'sha256', 'sha384', 'sha512'])

// Persisted record: exactly the ten keys, nothing more
export const SerializedRecordSchema = z.object({
  name: z.string(),
  path: z.string(),
  mode: z.string().regex(/^[0-7]+$/, 'mode must be octal digits'),
  uid: z.number().int(),
  gid: z.number().int(),
  size: z.number().int().nonnegative(),
  atime: z.number(),
  mtime: z.number(),
  ctime: z.number(),
  hash: z.string(),
}).strict()

export const SnapshotFileSchema = z.array(SerializedRecordSchema)

export const AuditConfigSchema = z.object({
  audit: z.object({
    algorithm: z.string().default('sha256'),
    recursive: z.boolean().default(false),
    ignore: z.array(z.string()).default([]),
    chunkSize: z.number().int().positive().default(128 * 1024 * 1024),
    errorPolicy: z.enum(['abort', 'skip']).default('abort'),
    legacyMultiRootSkip: z.boolean().default(false),
  }).default({}),
  diff: z.object({
    primaryKey: RecordKeySchema.default('path'),
    interestingKeys: z.array(RecordKeySchema).min(1).default(['hash', 'size']),
  }).default({}),
})
