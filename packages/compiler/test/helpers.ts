import { fileURLToPath } from 'node:url'
import type { SpecFile } from '../src/ast.js'
import { compose, type Composition } from '../src/composer.js'
import { buildImportGraph } from '../src/import-graph.js'
import { parseSpecFile } from '../src/parser.js'

export const SHOP_ROOT = fileURLToPath(new URL('./fixtures/shop', import.meta.url))

export function parseAll(sources: Record<string, string>): SpecFile[] {
  return Object.entries(sources).map(([path, text]) => {
    const result = parseSpecFile(text, path)
    if (!result.ok) throw new Error(`${path}: ${result.error.message}`)
    return result.value
  })
}

/** Parse, order and compose an in-memory file set that is known to be well-formed */
export function composeSources(sources: Record<string, string>): Composition {
  const files = parseAll(sources)
  const graph = buildImportGraph(files)
  if (!graph.ok) throw new Error(graph.error.map(e => e.message).join('\n'))
  return compose(files, graph.value)
}
