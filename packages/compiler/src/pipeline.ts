import type { ConstraintRule, Diagnostic, IRDocument, Result } from 'shared'
import type { SpecFile } from './ast.js'
import { compose } from './composer.js'
import { constraintRules } from './constraints.js'
import { hasErrors } from './diagnostics.js'
import { emitIR } from './emitter.js'
import { buildImportGraph } from './import-graph.js'
import type { ResolvedGraph } from './model.js'
import { parseSpecFile } from './parser.js'
import { loadSources, type SourceText } from './sources.js'
import { validateGraph } from './validator.js'

export interface CompileOptions {
  extensions?: readonly string[]
  /** Extra or replacement constraint rules, layered over the built-in table */
  constraints?: Record<string, ConstraintRule>
  /** Treat warnings as failures */
  strict?: boolean
  signal?: AbortSignal
}

export interface CompileOutput {
  document: IRDocument
  graph: ResolvedGraph
  /** Warnings of a successful run */
  diagnostics: Diagnostic[]
}

export type CompilePhase = 'io' | 'parse' | 'imports' | 'resolve' | 'aborted'

export interface CompileFailure {
  phase: CompilePhase
  diagnostics: Diagnostic[]
}

type CompileResult = Result<CompileOutput, CompileFailure>

function fail(phase: CompilePhase, diagnostics: Diagnostic[] = []): CompileResult {
  return { ok: false, error: { phase, diagnostics } }
}

/**
 * Run every phase over an in-memory file set. Each call builds its own
 * symbol table, so concurrent or repeated runs never share state.
 */
export function compileSources(sources: SourceText[], options: CompileOptions = {}): CompileResult {
  const { signal } = options
  if (signal?.aborted) return fail('aborted')

  const files: SpecFile[] = []
  const parseErrors: Diagnostic[] = []
  for (const source of sources) {
    const parsed = parseSpecFile(source.text, source.path)
    if (parsed.ok) files.push(parsed.value)
    else parseErrors.push(parsed.error)
  }
  if (parseErrors.length > 0) return fail('parse', parseErrors)
  if (signal?.aborted) return fail('aborted')

  const imports = buildImportGraph(files, options.extensions)
  if (!imports.ok) return fail('imports', imports.error)
  if (signal?.aborted) return fail('aborted')

  const composition = compose(files, imports.value)
  if (signal?.aborted) return fail('aborted')

  const diagnostics = [
    ...composition.diagnostics,
    ...validateGraph(composition.graph, constraintRules(options.constraints)),
  ]
  if (hasErrors(diagnostics) || (options.strict && diagnostics.length > 0)) {
    return fail('resolve', diagnostics)
  }

  return { ok: true, value: { document: emitIR(composition.graph), graph: composition.graph, diagnostics } }
}

export async function compileProject(root: string, options: CompileOptions = {}): Promise<CompileResult> {
  const loaded = await loadSources(root, options.extensions)
  if (!loaded.ok) return fail('io', loaded.error)
  return compileSources(loaded.value, options)
}
