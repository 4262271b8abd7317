import type { Result } from 'shared'
import { report, runCompile, selectReporter, type CompileReport, type ReporterName } from './compile.js'

export interface CheckOptions {
  strict?: boolean
  reporter?: ReporterName
}

/** Run every phase and report diagnostics without writing any IR */
export async function checkCommand(rootDir: string, options: CheckOptions = {}): Promise<Result<CompileReport, string>> {
  const result = await runCompile(rootDir, options, false)
  if (result.ok) report(result.value, selectReporter(options.reporter))
  return result
}
