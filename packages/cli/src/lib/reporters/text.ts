import type { Diagnostic } from 'shared'
import { countBySeverity, formatDiagnostic } from '@specml/compiler'

export function formatText(diagnostics: Diagnostic[], passed: boolean): string {
  const lines = diagnostics.map(formatDiagnostic)
  const { errors, warnings } = countBySeverity(diagnostics)
  const summary = `${errors} error${errors === 1 ? '' : 's'}, ${warnings} warning${warnings === 1 ? '' : 's'}`
  lines.push(passed ? `✅ Compiled (${summary})` : `❌ Compilation failed (${summary})`)
  return lines.join('\n')
}
