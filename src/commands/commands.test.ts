import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { run, createContext } from '../cli/runner'
import { CommandContext } from './types'
import { ConfigLoader } from '../config/ConfigLoader'
import { MemorySnapshotStore } from '../storage/MemoryStorage'
import { makeSerialized } from '../../test/fixtures/records'
import packageJson from '../../package.json'
import crypto from 'crypto'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('commands', () => {
  let tempDir: string
  let store: MemorySnapshotStore
  let stdout: string[]
  let stderr: string[]
  let context: CommandContext

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'commands-test-'))
    store = new MemorySnapshotStore()
    stdout = []
    stderr = []
    context = createContext({
      configLoader: new ConfigLoader('/non/existent/path.json'),
      store,
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
    })
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('audit', () => {
    beforeEach(() => {
      fs.writeFileSync(path.join(tempDir, 'a.txt'), 'alpha')
      fs.writeFileSync(path.join(tempDir, 'b.log'), 'beta')
    })

    it('should print one path per file', async () => {
      const code = await run(['audit', tempDir], context)

      expect(code).toBe(0)
      expect(stdout).toEqual([path.join(tempDir, 'a.txt'), path.join(tempDir, 'b.log')])
      expect(stderr).toEqual([])
    })

    it('should treat arguments without a command name as an audit', async () => {
      expect(await run([tempDir, '--ignore', '*.log'], context)).toBe(0)
      expect(stdout).toEqual([path.join(tempDir, 'a.txt')])
    })

    it('should render the output template', async () => {
      await run(['audit', tempDir, '-s', '{name}:{size}', '-a', 'md5'], context)

      expect(stdout).toEqual(['a.txt:5', 'b.log:4'])
    })

    it('should report an unknown placeholder before touching any file', async () => {
      const code = await run(['audit', path.join(tempDir, 'missing'), '--string', '{path} {bogus}'], context)

      expect(code).toBe(1)
      expect(stdout).toEqual([])
      expect(stderr[0]).toMatch(/^fsaudit: Unknown placeholder "\{bogus\}"/)
    })

    it('should warn and use sha256 for an unknown algorithm', async () => {
      await run(['audit', path.join(tempDir, 'a.txt'), '-a', 'crc32', '-s', '{hash}'], context)

      expect(stderr).toEqual(['fsaudit: unknown hash algorithm "crc32", using sha256'])
      expect(stdout).toEqual([crypto.createHash('sha256').update('alpha').digest('hex')])
    })

    it('should save JSON and CSV snapshots', async () => {
      await run(['audit', tempDir, '--json', 'out.json', '--csv', 'out.csv'], context)

      const saved = JSON.parse(store.getRaw('out.json') ?? '[]')
      expect(saved.map((entry: { path: string }) => entry.path)).toEqual([
        path.join(tempDir, 'a.txt'),
        path.join(tempDir, 'b.log'),
      ])
      expect(store.getRaw('out.csv')?.split('\r\n')).toHaveLength(4)
    })

    it('should require a path', async () => {
      expect(await run(['audit'], context)).toBe(1)
      expect(stderr[0]).toMatch(/^fsaudit: At least one PATH is required/)
    })

    it('should reject unknown flags', async () => {
      expect(await run(['audit', tempDir, '--fast'], context)).toBe(1)
      expect(stderr[0]).toContain('Usage: fsaudit audit PATH...')
    })

    it('should fail on a missing path', async () => {
      expect(await run(['audit', path.join(tempDir, 'missing')], context)).toBe(1)
      expect(stderr[0]).toMatch(/^fsaudit: Cannot access /)
    })
  })

  describe('diff', () => {
    beforeEach(() => {
      store.setRaw('one.json', JSON.stringify([
        makeSerialized({ path: 'a.txt', hash: 'h1' }),
        makeSerialized({ path: 'b.txt', hash: 'h2' }),
      ]))
      store.setRaw('two.json', JSON.stringify([
        makeSerialized({ path: 'a.txt', hash: 'h1' }),
        makeSerialized({ path: 'b.txt', hash: 'h9', size: 40 }),
      ]))
    })

    it('should print the grouped report', async () => {
      const code = await run(['diff', 'one.json', 'two.json'], context)

      expect(code).toBe(0)
      expect(stdout).toEqual([
        '',
        'File @ Archive                             hash      size      sum    ',
        'a.txt @ one.json                            0         0         0     ',
        'a.txt @ two.json                            0         0         0     ',
        '',
        'b.txt @ one.json                            0         0         0     ',
        'b.txt @ two.json                            1         1         1     ',
        '',
      ])
    })

    it('should accept the --diff spelling', async () => {
      expect(await run(['--diff', 'one.json', 'two.json'], context)).toBe(0)
      expect(stdout).toHaveLength(8)
    })

    it('should print nothing when a snapshot is malformed', async () => {
      store.setRaw('bad.json', JSON.stringify([{ path: 'a.txt' }]))

      expect(await run(['diff', 'one.json', 'bad.json'], context)).toBe(1)
      expect(stdout).toEqual([])
      expect(stderr[0]).toMatch(/^fsaudit: Malformed record 0: /)
    })

    it('should require at least two snapshots', async () => {
      expect(await run(['diff', 'one.json'], context)).toBe(1)
      expect(stderr[0]).toMatch(/^fsaudit: At least two snapshots are required/)
    })
  })

  describe('version and help', () => {
    it('should print the package version', async () => {
      expect(await run(['--version'], context)).toBe(0)
      expect(stdout).toEqual([`fsaudit v${packageJson.version}`])
    })

    it('should list every command', async () => {
      expect(await run([], context)).toBe(0)
      expect(stdout.filter((line) => /^ {2}\w/.test(line)).map((line) => line.trim().split(/\s+/)[0])).toEqual([
        'audit',
        'diff',
        'version',
        'help',
      ])
    })
  })
})
