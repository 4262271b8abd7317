import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type { SpecWatcher } from '@specml/compiler'
import { watchCommand } from '../src/commands/watch.js'

describe('specml watch', () => {
  let tempDir: string
  let watcher: SpecWatcher | undefined

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'specml-watch-cli-'))
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    watcher?.stop()
    watcher = undefined
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('writes the IR on the initial compile', async () => {
    await writeFile(join(tempDir, 'tag.data.spec'), 'Tag {\n  label string\n}\n')

    const result = await watchCommand(tempDir, { out: join(tempDir, 'out.json') })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    watcher = result.value

    const document: { entities: Record<string, unknown> } = JSON.parse(await readFile(join(tempDir, 'out.json'), 'utf-8'))
    expect(Object.keys(document.entities)).toEqual(['Tag'])
  })

  it('returns an error for an invalid specml.yaml', async () => {
    await writeFile(join(tempDir, 'specml.yaml'), 'output: ""\n')
    const result = await watchCommand(tempDir)
    expect(result).toEqual({
      ok: false,
      error: 'Invalid configuration:\n  specml.yaml/output: must NOT have fewer than 1 characters',
    })
  })
})
