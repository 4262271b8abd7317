import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { SpecWatcher, formatDiagnostic, serializeIR } from '@specml/compiler'
import type { Result } from 'shared'
import { resolveConfig } from './compile.js'

export interface WatchOptions {
  out?: string
  debounce?: number
  strict?: boolean
}

export async function watchCommand(rootDir: string, options: WatchOptions = {}): Promise<Result<SpecWatcher, string>> {
  const root = resolve(rootDir)
  const config = await resolveConfig(root)
  if (!config.ok) return config

  const { extensions, constraints } = config.value
  const output = options.out ? resolve(options.out) : resolve(root, config.value.output)

  const watcher = new SpecWatcher({
    root,
    extensions,
    constraints,
    strict: options.strict ?? config.value.strict,
    debounce: options.debounce,
    onCompile: async (result) => {
      const diagnostics = result.ok ? result.value.diagnostics : result.error.diagnostics
      for (const d of diagnostics) console.error(formatDiagnostic(d))

      if (!result.ok) {
        if (result.error.phase !== 'aborted') console.error(`❌ Compilation failed in ${result.error.phase} phase`)
        return
      }

      try {
        await mkdir(dirname(output), { recursive: true })
        await writeFile(output, serializeIR(result.value.document))
        console.error(`✅ Wrote ${output}`)
      } catch (error) {
        console.error(`❌ Failed to write ${output}: ${error instanceof Error ? error.message : String(error)}`)
      }
    },
  })

  await watcher.start()
  console.error(`👀 Watching ${root}`)
  return { ok: true, value: watcher }
}
