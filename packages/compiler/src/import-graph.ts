import type { Diagnostic, Result } from 'shared'
import type { SpecFile } from './ast.js'

export interface ImportEdge {
  from: string
  to: string
  line: number
  column: number
}

export interface ImportGraph {
  /** Every file appears after all the files it imports */
  order: string[]
  edges: ImportEdge[]
  /** Transitive imports of each file, not including the file itself */
  closure: Map<string, Set<string>>
}

/**
 * Map an `@/dir/file` import onto a discovered file path. The extension may
 * be left off when it is one of the configured spec extensions.
 */
export function resolveImportPath(
  raw: string,
  known: ReadonlySet<string>,
  extensions: readonly string[] = ['.spec'],
): string | null {
  if (!raw.startsWith('@/')) return null
  const relative = raw.slice(2)
  if (known.has(relative)) return relative
  for (const ext of extensions) {
    if (known.has(relative + ext)) return relative + ext
  }
  return null
}

export function buildImportGraph(
  files: SpecFile[],
  extensions?: readonly string[],
): Result<ImportGraph, Diagnostic[]> {
  const known = new Set(files.map(f => f.path))
  const edges: ImportEdge[] = []
  const targets = new Map<string, string[]>()
  const errors: Diagnostic[] = []

  for (const file of files) {
    const resolved: string[] = []
    for (const node of file.imports) {
      const to = resolveImportPath(node.path, known, extensions)
      if (to === null) {
        errors.push({
          kind: 'UnresolvedImportError',
          severity: 'error',
          message: `Cannot resolve import '${node.path}'`,
          file: file.path,
          line: node.line,
          column: node.column,
          path: node.path,
        })
        continue
      }
      edges.push({ from: file.path, to, line: node.line, column: node.column })
      if (!resolved.includes(to)) resolved.push(to)
    }
    targets.set(file.path, resolved)
  }

  if (errors.length > 0) {
    return { ok: false, error: errors }
  }

  const done = new Set<string>()
  const visiting = new Set<string>()
  const stack: string[] = []
  const order: string[] = []

  function visit(path: string): string[] | null {
    visiting.add(path)
    stack.push(path)

    for (const to of targets.get(path) ?? []) {
      if (visiting.has(to)) {
        return [...stack.slice(stack.indexOf(to)), to]
      }
      if (!done.has(to)) {
        const cycle = visit(to)
        if (cycle) return cycle
      }
    }

    stack.pop()
    visiting.delete(path)
    done.add(path)
    order.push(path)
    return null
  }

  for (const file of files) {
    if (done.has(file.path)) continue
    const cycle = visit(file.path)
    if (cycle) {
      const from = cycle[cycle.length - 2]
      const to = cycle[cycle.length - 1]
      const backEdge = edges.find(e => e.from === from && e.to === to)
      return {
        ok: false,
        error: [{
          kind: 'CyclicImportError',
          severity: 'error',
          message: `Import cycle detected: ${cycle.join(' → ')}`,
          file: from,
          line: backEdge?.line ?? 1,
          column: backEdge?.column ?? 1,
          cycle,
        }],
      }
    }
  }

  const closure = new Map<string, Set<string>>()
  for (const path of order) {
    const reachable = new Set<string>()
    for (const to of targets.get(path) ?? []) {
      reachable.add(to)
      for (const further of closure.get(to) ?? []) reachable.add(further)
    }
    closure.set(path, reachable)
  }

  return { ok: true, value: { order, edges, closure } }
}
