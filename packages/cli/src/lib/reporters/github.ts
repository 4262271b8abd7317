import type { Diagnostic } from 'shared'

function escapeData(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A')
}

function escapeProperty(value: string): string {
  return escapeData(value).replace(/:/g, '%3A').replace(/,/g, '%2C')
}

/** One workflow command per diagnostic, so GitHub annotates the spec file inline */
export function formatGitHub(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map(d => {
      const properties = [
        `file=${escapeProperty(d.file)}`,
        `line=${d.line}`,
        `col=${d.column}`,
        `title=${escapeProperty(d.kind)}`,
      ].join(',')
      return `::${d.severity} ${properties}::${escapeData(d.message)}`
    })
    .join('\n')
}
