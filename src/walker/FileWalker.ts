import fs from 'fs'
import path from 'path'
import { minimatch } from 'minimatch'
import { FileAccessError } from '../errors/AuditErrors'

export interface WalkOptions {
  recursive?: boolean
  ignore?: readonly string[]
  // Called for unreadable directories, which are then skipped; without it they throw
  onError?: (error: FileAccessError) => void
}

const SEPARATOR = path.sep === '\\' ? /[\\/]+/ : /\/+/

// Plain shell globs: no negation, comments, braces or extglobs
const SHELL_GLOB = { dot: true, nonegate: true, nocomment: true, nobrace: true, noext: true }

/**
 * True when the file name or any ancestor directory name matches one of the
 * shell-glob patterns. Patterns are tested per component, never against the
 * full path.
 */
export function isIgnored(filePath: string, patterns: readonly string[] = []): boolean {
  if (patterns.length === 0) {
    return false
  }

  const components = filePath
    .split(SEPARATOR)
    .filter((part) => part !== '' && part !== '.' && part !== '..')

  return components.some((component) =>
    patterns.some((pattern) => minimatch(component, pattern, SHELL_GLOB))
  )
}

// Keeps the caller's spelling of the root so paths join across snapshots
function joinPath(dir: string, name: string): string {
  return dir.endsWith('/') || dir.endsWith(path.sep) ? `${dir}${name}` : `${dir}${path.sep}${name}`
}

export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory()
  } catch {
    return false
  }
}

type EntryKind = 'file' | 'directory' | 'other'

function classify(entry: fs.Dirent, fullPath: string): EntryKind {
  if (entry.isDirectory()) return 'directory'
  if (entry.isFile()) return 'file'
  if (!entry.isSymbolicLink()) return 'other'

  // Linked directories are listed but never descended; broken links are
  // reported as files so that reading them fails loudly
  try {
    const target = fs.statSync(fullPath)
    if (target.isDirectory()) return 'directory'
    return target.isFile() ? 'file' : 'other'
  } catch {
    return 'file'
  }
}

/**
 * Lazily yield the file paths under `root`, top-down. Files of a directory
 * come before its subdirectories; entries are sorted by name. Directories are
 * never yielded, so empty ones produce nothing.
 */
export function* walkFiles(root: string, options: WalkOptions = {}): Generator<string> {
  const ignore = options.ignore ?? []

  if (!isDirectory(root)) {
    if (!isIgnored(root, ignore)) {
      yield root
    }
    return
  }

  yield* walkDir(root, options.recursive ?? false, ignore, options.onError)
}

function* walkDir(
  dir: string,
  recursive: boolean,
  ignore: readonly string[],
  onError?: (error: FileAccessError) => void
): Generator<string> {
  let entries: fs.Dirent[]
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true })
  } catch (error) {
    const failure = new FileAccessError(dir, error)
    if (!onError) {
      throw failure
    }
    onError(failure)
    return
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  const subdirs: string[] = []
  for (const entry of entries) {
    const fullPath = joinPath(dir, entry.name)
    const kind = classify(entry, fullPath)

    if (kind === 'directory') {
      if (recursive && !entry.isSymbolicLink()) {
        subdirs.push(fullPath)
      }
      continue
    }

    if (kind === 'file' && !isIgnored(fullPath, ignore)) {
      yield fullPath
    }
  }

  for (const subdir of subdirs) {
    if (isIgnored(subdir, ignore)) {
      continue
    }
    yield* walkDir(subdir, recursive, ignore, onError)
  }
}
