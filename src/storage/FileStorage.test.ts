import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { FileSnapshotStore } from './FileStorage'
import { MemorySnapshotStore } from './MemoryStorage'
import { formatForLocation } from './Storage'
import { Snapshot } from '../snapshot/Snapshot'
import { FileAccessError, SnapshotFormatError } from '../errors/AuditErrors'
import { makeRecord, makeSerialized } from '../../test/fixtures/records'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('FileSnapshotStore', () => {
  let tempDir: string
  let store: FileSnapshotStore

  const twoRecords = () =>
    new Snapshot('path').addAll([
      makeRecord({ path: '/data/a.txt', hash: 'aaa' }),
      makeRecord({ path: '/data/b.txt', hash: 'bbb', sizeBytes: 0, modifyTime: 1699999999.999 }),
    ])

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'store-test-'))
    store = new FileSnapshotStore()
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it.each([['audit.json'], ['audit.csv']])('should round-trip a snapshot through %s', async (fileName) => {
    const location = path.join(tempDir, fileName)
    const original = twoRecords()

    await store.save(original, location)
    const loaded = await store.load(location, 'path')

    expect(loaded.name).toBe(location)
    expect(loaded.records).toEqual(original.records)
    expect(loaded.get('path', '/data/a.txt')).toEqual(original.get('path', '/data/a.txt'))
    expect(loaded.get('path', '/data/b.txt')).toEqual(original.get('path', '/data/b.txt'))
  })

  it('should write a JSON array of persisted dictionaries', async () => {
    const location = path.join(tempDir, 'nested', 'audit.json')

    await store.save(new Snapshot('path').addAll([makeRecord()]), location)

    expect(JSON.parse(fs.readFileSync(location, 'utf8'))).toEqual([makeSerialized()])
  })

  it('should honour an explicit format over the extension', async () => {
    const location = path.join(tempDir, 'audit.out')

    await store.save(twoRecords(), location, 'csv')

    expect(fs.readFileSync(location, 'utf8').split('\r\n')[0]).toBe('name,path,mode,uid,gid,size,atime,mtime,ctime,hash')
    expect((await store.load(location, 'path', 'csv')).size).toBe(2)
  })

  it('should fail the whole load on one malformed record', async () => {
    const location = path.join(tempDir, 'broken.json')
    const { size: _size, ...withoutSize } = makeSerialized({ path: '/b' })
    fs.writeFileSync(location, JSON.stringify([makeSerialized(), withoutSize]))

    const failure = store.load(location, 'path')

    await expect(failure).rejects.toBeInstanceOf(SnapshotFormatError)
    await expect(failure).rejects.toThrow(`${location}: Malformed record 1: size: Required`)
  })

  it('should reject invalid JSON and non-array documents', async () => {
    const invalid = path.join(tempDir, 'invalid.json')
    const object = path.join(tempDir, 'object.json')
    fs.writeFileSync(invalid, '[{')
    fs.writeFileSync(object, '{"records": []}')

    await expect(store.load(invalid, 'path')).rejects.toBeInstanceOf(SnapshotFormatError)
    await expect(store.load(object, 'path')).rejects.toThrow(`${object}: Snapshot must be a JSON array of records`)
  })

  it('should report a missing snapshot file as an access error', async () => {
    await expect(store.load(path.join(tempDir, 'missing.json'), 'path')).rejects.toBeInstanceOf(FileAccessError)
  })
})

describe('MemorySnapshotStore', () => {
  it('should round-trip snapshots in memory', async () => {
    const store = new MemorySnapshotStore()
    const snapshot = new Snapshot('path').addAll([makeRecord()])

    await store.save(snapshot, 'one.json')

    expect(JSON.parse(store.getRaw('one.json') ?? 'null')).toEqual([makeSerialized()])
    expect((await store.load('one.json', 'path')).records).toEqual(snapshot.records)
  })

  it('should fail for unknown locations', async () => {
    await expect(new MemorySnapshotStore().load('nope.json', 'path')).rejects.toBeInstanceOf(FileAccessError)
  })
})

describe('formatForLocation', () => {
  it('should pick CSV only for .csv files', () => {
    expect(formatForLocation('audit.CSV')).toBe('csv')
    expect(formatForLocation('audit.json')).toBe('json')
    expect(formatForLocation('audit')).toBe('json')
  })
})
