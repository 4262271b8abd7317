import type { Diagnostic } from 'shared'

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

export function formatJUnit(diagnostics: Diagnostic[]): string {
  const failures = diagnostics.filter(d => d.severity === 'error').length
  const tests = diagnostics.length || 1

  let xml = `<?xml version="1.0" encoding="UTF-8"?>\n`
  xml += `<testsuites tests="${tests}" failures="${failures}">\n`
  xml += `  <testsuite name="specml" tests="${tests}" failures="${failures}">\n`

  if (diagnostics.length === 0) {
    xml += `    <testcase name="specml-compile" classname="specml">\n`
    xml += `    </testcase>\n`
  }

  for (const d of diagnostics) {
    const name = `${d.file}:${d.line}:${d.column}`
    xml += `    <testcase name="${escapeXml(name)}" classname="specml.${d.kind}">\n`
    if (d.severity === 'error') {
      xml += `      <failure message="${escapeXml(d.message)}" type="${d.kind}">${escapeXml(d.message)}</failure>\n`
    } else {
      xml += `      <system-out>${escapeXml(d.message)}</system-out>\n`
    }
    xml += `    </testcase>\n`
  }

  xml += `  </testsuite>\n`
  xml += `</testsuites>`

  return xml
}
