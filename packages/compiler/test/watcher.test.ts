import { describe, it, expect, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { SpecWatcher } from '../src/watcher.js'

function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

describe('SpecWatcher', () => {
  const dirs: string[] = []
  const watchers: SpecWatcher[] = []

  afterEach(async () => {
    for (const w of watchers) w.stop()
    watchers.length = 0
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  async function setup(): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'specml-watch-'))
    dirs.push(dir)
    await writeFile(join(dir, 'user.data.spec'), 'User {\n  id string\n}\n')
    return dir
  }

  it('compiles once on start', async () => {
    const root = await setup()
    const onCompile = vi.fn()
    const watcher = new SpecWatcher({ root, onCompile })
    watchers.push(watcher)

    await watcher.start()

    expect(onCompile).toHaveBeenCalledTimes(1)
    expect(onCompile.mock.calls[0][0]).toMatchObject({ ok: true })
  })

  it('debounces bursts of changes into one run', async () => {
    const root = await setup()
    const onCompile = vi.fn()
    const watcher = new SpecWatcher({ root, debounce: 20, onCompile })
    watchers.push(watcher)

    watcher.schedule()
    watcher.schedule()
    watcher.schedule()
    await wait(200)

    expect(onCompile).toHaveBeenCalledTimes(1)
  })

  it('recompiles when a spec file changes and ignores other files', async () => {
    const root = await setup()
    const onCompile = vi.fn()
    const watcher = new SpecWatcher({ root, debounce: 50, onCompile })
    watchers.push(watcher)

    await watcher.start()
    expect(onCompile).toHaveBeenCalledTimes(1)
    await wait(100)

    await writeFile(join(root, 'tag.data.spec'), 'Tag {\n  label string\n}\n')
    await wait(400)
    expect(onCompile).toHaveBeenCalledTimes(2)
    expect(onCompile.mock.calls[1][0]).toMatchObject({ ok: true })

    await writeFile(join(root, 'notes.txt'), 'not a spec file\n')
    await wait(400)
    expect(onCompile).toHaveBeenCalledTimes(2)
  })

  it('drops a run that is overtaken by a newer one', async () => {
    const root = await setup()
    const onCompile = vi.fn()
    const watcher = new SpecWatcher({ root, onCompile })
    watchers.push(watcher)

    const first = watcher.run()
    const second = watcher.run()
    await Promise.all([first, second])

    expect(onCompile).toHaveBeenCalledTimes(1)
    expect(onCompile.mock.calls[0][0]).toMatchObject({ ok: true })
  })

  it('reports failures of the latest run', async () => {
    const root = await setup()
    await writeFile(join(root, 'broken.spec'), 'Broken {\n')
    const onCompile = vi.fn()
    const watcher = new SpecWatcher({ root, onCompile })
    watchers.push(watcher)

    await watcher.run()

    expect(onCompile).toHaveBeenCalledWith({
      ok: false,
      error: {
        phase: 'parse',
        diagnostics: [{
          kind: 'ParseError',
          severity: 'error',
          message: "Expected '}' but found end of file",
          file: 'broken.spec',
          line: 2,
          column: 1,
          expected: "'}'",
          found: 'end of file',
        }],
      },
    })
  })
})
