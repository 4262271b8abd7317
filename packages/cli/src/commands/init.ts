import { writeFile, access } from 'node:fs/promises'
import { resolve, join } from 'node:path'
import { stringify } from 'yaml'
import type { Result } from 'shared'
import { CONFIG_FILE, DEFAULT_CONFIG } from '../lib/config.js'

export interface InitOptions {
  force?: boolean
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export async function initCommand(dir: string, options: InitOptions = {}): Promise<Result<string, string>> {
  const configPath = join(resolve(dir), CONFIG_FILE)

  if (await fileExists(configPath)) {
    if (!options.force) {
      return { ok: false, error: `${CONFIG_FILE} already exists. Use --force to overwrite.` }
    }
  }

  const { extensions, output, strict } = DEFAULT_CONFIG
  await writeFile(configPath, stringify({ extensions, output, strict }))

  console.error(`✅ Created ${configPath}`)
  console.error(`\nNext steps:`)
  console.error(`  specml check .    Validate your spec files`)
  console.error(`  specml compile .  Write ${output}`)

  return { ok: true, value: configPath }
}
