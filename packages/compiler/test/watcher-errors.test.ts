import { describe, it, expect, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { SpecWatcher } from '../src/watcher.js'

interface FakeWatcher {
  emit(event: string, ...args: unknown[]): boolean
  close: () => void
}

const fake = vi.hoisted(() => {
  const watchers: FakeWatcher[] = []
  return { watchers }
})

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>()
  const { EventEmitter } = await import('node:events')
  return {
    ...actual,
    watch: () => {
      const watcher = Object.assign(new EventEmitter(), { close: vi.fn() })
      fake.watchers.push(watcher)
      return watcher
    },
  }
})

describe('SpecWatcher errors', () => {
  const dirs: string[] = []

  afterEach(async () => {
    vi.restoreAllMocks()
    fake.watchers.length = 0
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  it('reports a failing file watcher and stops', async () => {
    const root = await mkdtemp(join(tmpdir(), 'specml-watch-error-'))
    dirs.push(root)
    await writeFile(join(root, 'user.data.spec'), 'User {\n  id string\n}\n')
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const watcher = new SpecWatcher({ root, onCompile: vi.fn() })
    await watcher.start()
    expect(fake.watchers).toHaveLength(1)

    const [fsWatcher] = fake.watchers
    expect(() => fsWatcher.emit('error', new Error('ENOSPC: System limit for number of file watchers reached'))).not.toThrow()
    expect(error).toHaveBeenCalledWith(
      `Watching ${root} failed: ENOSPC: System limit for number of file watchers reached`,
    )
    expect(fsWatcher.close).toHaveBeenCalledTimes(1)
    watcher.stop()
  })
})
