import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { compileProject, serializeIR, type CompilePhase } from '@specml/compiler'
import type { Diagnostic, Result, SpecmlConfig } from 'shared'
import { loadConfig } from '../lib/config.js'
import { formatGitHub } from '../lib/reporters/github.js'
import { formatJUnit } from '../lib/reporters/junit.js'
import { formatText } from '../lib/reporters/text.js'

export type ReporterName = 'text' | 'json' | 'junit' | 'github'

export const REPORTERS: readonly ReporterName[] = ['text', 'json', 'junit', 'github']

export interface CompileCommandOptions {
  out?: string
  stdout?: boolean
  strict?: boolean
  reporter?: ReporterName
}

export interface CompileReport {
  passed: boolean
  /** Phase that stopped the run, when it failed */
  phase?: CompilePhase
  diagnostics: Diagnostic[]
  /** Where the IR was written, if anywhere */
  output?: string
}

export function selectReporter(requested?: ReporterName): ReporterName {
  if (requested) return requested
  return process.env.GITHUB_ACTIONS === 'true' ? 'github' : 'text'
}

export function report(result: CompileReport, reporter: ReporterName): void {
  switch (reporter) {
    case 'json':
      console.log(JSON.stringify(result, null, 2))
      break
    case 'junit':
      console.log(formatJUnit(result.diagnostics))
      break
    case 'github':
      if (result.diagnostics.length > 0) console.log(formatGitHub(result.diagnostics))
      break
    default:
      console.error(formatText(result.diagnostics, result.passed))
  }
}

export function formatConfigErrors(errors: { path: string; message: string }[]): string {
  return `Invalid configuration:\n${errors.map(e => `  ${e.path}: ${e.message}`).join('\n')}`
}

export async function resolveConfig(root: string): Promise<Result<SpecmlConfig, string>> {
  const config = await loadConfig(root)
  if (!config.ok) return { ok: false, error: formatConfigErrors(config.error) }
  return config
}

/**
 * Compile the project under `rootDir`. The IR is only written when the run
 * passes, so a failed compile never leaves a partial or stale-looking file.
 */
export async function compileCommand(
  rootDir: string,
  options: CompileCommandOptions = {},
): Promise<Result<CompileReport, string>> {
  const result = await runCompile(rootDir, options, true)
  if (result.ok) report(result.value, selectReporter(options.reporter))
  return result
}

export async function runCompile(
  rootDir: string,
  options: CompileCommandOptions,
  emit: boolean,
): Promise<Result<CompileReport, string>> {
  const root = resolve(rootDir)
  const config = await resolveConfig(root)
  if (!config.ok) return config

  const { extensions, constraints } = config.value
  const strict = options.strict ?? config.value.strict
  const compiled = await compileProject(root, { extensions, constraints, strict })

  if (!compiled.ok) {
    return {
      ok: true,
      value: { passed: false, phase: compiled.error.phase, diagnostics: compiled.error.diagnostics },
    }
  }

  const value: CompileReport = { passed: true, diagnostics: compiled.value.diagnostics }
  if (!emit) return { ok: true, value }

  const ir = serializeIR(compiled.value.document)
  if (options.stdout) {
    process.stdout.write(ir)
    return { ok: true, value }
  }

  const output = options.out ? resolve(options.out) : resolve(root, config.value.output)
  try {
    await mkdir(dirname(output), { recursive: true })
    await writeFile(output, ir)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, error: `Failed to write ${output}: ${message}` }
  }
  return { ok: true, value: { ...value, output } }
}
