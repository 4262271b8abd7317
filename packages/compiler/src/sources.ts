import { readFile, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { Diagnostic, Result } from 'shared'

export interface SourceText {
  /** Root-relative path with forward slashes */
  path: string
  text: string
}

function ioError(file: string, error: unknown): Diagnostic {
  const message = error instanceof Error ? error.message : String(error)
  return { kind: 'IoError', severity: 'error', message, file, line: 1, column: 1 }
}

/**
 * Find every spec file under `root`, skipping `node_modules` and dot
 * directories. Paths come back root-relative, `/`-separated and sorted.
 */
export async function discoverSpecFiles(root: string, extensions: readonly string[] = ['.spec']): Promise<string[]> {
  const found: string[] = []

  async function walk(relative: string): Promise<void> {
    const entries = await readdir(join(root, relative), { withFileTypes: true })
    for (const entry of entries) {
      const path = relative ? `${relative}/${entry.name}` : entry.name
      if (entry.isDirectory()) {
        if (entry.name === 'node_modules' || entry.name.startsWith('.')) continue
        await walk(path)
      } else if (entry.isFile() && extensions.some(ext => entry.name.endsWith(ext))) {
        found.push(path)
      }
    }
  }

  await walk('')
  return found.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

export async function readSources(root: string, paths: string[]): Promise<Result<SourceText[], Diagnostic[]>> {
  const results = await Promise.all(paths.map(async (path): Promise<Result<SourceText, Diagnostic>> => {
    try {
      return { ok: true, value: { path, text: await readFile(join(root, path), 'utf-8') } }
    } catch (error) {
      return { ok: false, error: ioError(path, error) }
    }
  }))

  const sources: SourceText[] = []
  const errors: Diagnostic[] = []
  for (const result of results) {
    if (result.ok) sources.push(result.value)
    else errors.push(result.error)
  }
  return errors.length > 0 ? { ok: false, error: errors } : { ok: true, value: sources }
}

export async function loadSources(root: string, extensions?: readonly string[]): Promise<Result<SourceText[], Diagnostic[]>> {
  let paths: string[]
  try {
    paths = await discoverSpecFiles(root, extensions)
  } catch (error) {
    return { ok: false, error: [ioError(root, error)] }
  }
  return readSources(root, paths)
}
