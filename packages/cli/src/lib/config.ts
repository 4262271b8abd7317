import { readFile, access } from 'node:fs/promises'
import { join } from 'node:path'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import { configSchema } from 'shared'
import type {
  ConstraintParameter,
  ConstraintRule,
  ConstraintTarget,
  Result,
  SpecmlConfig,
  ValidationError,
} from 'shared'

export const CONFIG_FILE = 'specml.yaml'

export const DEFAULT_CONFIG: SpecmlConfig = {
  extensions: ['.spec'],
  output: 'specml.ir.json',
  strict: false,
  constraints: {},
}

interface ConfigFile {
  extensions?: string[]
  output?: string
  strict?: boolean
  constraints?: Record<string, { types: ConstraintTarget[]; parameter?: ConstraintParameter }>
}

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<ConfigFile>(configSchema)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load `specml.yaml` from the project root. A missing or empty file means
 * defaults; anything else must match the config schema.
 */
export async function loadConfig(root: string): Promise<Result<SpecmlConfig, ValidationError[]>> {
  const configPath = join(root, CONFIG_FILE)
  if (!(await fileExists(configPath))) {
    return { ok: true, value: DEFAULT_CONFIG }
  }

  let parsed: unknown
  try {
    parsed = parseYaml(await readFile(configPath, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, error: [{ path: CONFIG_FILE, message: `Failed to parse ${CONFIG_FILE}: ${message}` }] }
  }

  if (parsed === null || parsed === undefined) {
    return { ok: true, value: DEFAULT_CONFIG }
  }

  if (!validateConfig(parsed)) {
    return {
      ok: false,
      error: (validateConfig.errors ?? []).map(e => ({
        path: `${CONFIG_FILE}${e.instancePath}`,
        message: e.message ?? 'Unknown validation error',
      })),
    }
  }

  const constraints = Object.fromEntries(
    Object.entries(parsed.constraints ?? {}).map(([name, rule]): [string, ConstraintRule] => [
      name,
      { types: rule.types, parameter: rule.parameter ?? 'none' },
    ]),
  )

  return {
    ok: true,
    value: {
      extensions: parsed.extensions ?? DEFAULT_CONFIG.extensions,
      output: parsed.output ?? DEFAULT_CONFIG.output,
      strict: parsed.strict ?? DEFAULT_CONFIG.strict,
      constraints,
    },
  }
}
