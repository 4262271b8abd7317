import { watch, type FSWatcher } from 'node:fs'
import type { Result } from 'shared'
import { compileProject, type CompileFailure, type CompileOptions, type CompileOutput } from './pipeline.js'

export interface WatcherOptions extends Omit<CompileOptions, 'signal'> {
  root: string
  /** Quiet period after the last change before recompiling, in ms */
  debounce?: number
  onCompile: (result: Result<CompileOutput, CompileFailure>) => void | Promise<void>
}

/**
 * Recompiles a project whenever one of its spec files changes. A run that
 * is overtaken by a newer change is aborted and never reported.
 */
export class SpecWatcher {
  private watcher?: FSWatcher
  private debounceTimer?: NodeJS.Timeout
  private controller?: AbortController
  private readonly debounce: number

  constructor(private readonly options: WatcherOptions) {
    this.debounce = options.debounce ?? 300
  }

  async start(): Promise<void> {
    await this.run()

    const extensions = this.options.extensions ?? ['.spec']
    this.watcher = watch(this.options.root, { recursive: true }, (_event, filename) => {
      if (filename === null || extensions.some(ext => filename.endsWith(ext))) {
        this.schedule()
      }
    })
    // An FSWatcher that emitted 'error' delivers no further events
    this.watcher.on('error', error => {
      console.error(`Watching ${this.options.root} failed: ${error.message}`)
      this.stop()
    })
  }

  stop(): void {
    this.watcher?.close()
    this.watcher = undefined
    if (this.debounceTimer) clearTimeout(this.debounceTimer)
    this.debounceTimer = undefined
    this.controller?.abort()
  }

  schedule(): void {
    if (this.debounceTimer) clearTimeout(this.debounceTimer)
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined
      this.run().catch(error => {
        console.error(`Recompilation failed: ${error instanceof Error ? error.message : String(error)}`)
      })
    }, this.debounce)
  }

  async run(): Promise<void> {
    this.controller?.abort()
    const controller = new AbortController()
    this.controller = controller

    const { root, onCompile, extensions, constraints, strict } = this.options
    const result = await compileProject(root, { extensions, constraints, strict, signal: controller.signal })
    if (controller.signal.aborted) return

    await onCompile(result)
  }
}
