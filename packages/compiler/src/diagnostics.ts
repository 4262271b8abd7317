import type { Diagnostic } from 'shared'

/** `file:line:column severity Kind: message` */
export function formatDiagnostic(d: Diagnostic): string {
  return `${d.file}:${d.line}:${d.column} ${d.severity} ${d.kind}: ${d.message}`
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'error')
}

export function countBySeverity(diagnostics: Diagnostic[]): { errors: number; warnings: number } {
  const errors = diagnostics.filter(d => d.severity === 'error').length
  return { errors, warnings: diagnostics.length - errors }
}
