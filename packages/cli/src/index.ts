#!/usr/bin/env tsx
import { Command, InvalidArgumentError, Option } from 'commander'
import { checkCommand } from './commands/check.js'
import { compileCommand, REPORTERS, type CompileCommandOptions } from './commands/compile.js'
import { initCommand, type InitOptions } from './commands/init.js'
import { watchCommand, type WatchOptions } from './commands/watch.js'
import type { Result } from 'shared'
import type { CompileReport } from './commands/compile.js'

function parseMilliseconds(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

function exitOnFailure(result: Result<CompileReport, string>): void {
  if (!result.ok) {
    console.error(`Error: ${result.error}`)
    process.exit(1)
  }
  if (!result.value.passed) process.exit(1)
}

const reporterOption = () =>
  new Option('--reporter <reporter>', 'Diagnostic output format').choices(REPORTERS)

const program = new Command()

program
  .name('specml')
  .description('Compiler for SPECML schema definitions')
  .version('0.1.0')

program
  .command('compile <root>')
  .description('Compile every spec file under <root> into an IR document')
  .option('-o, --out <file>', 'Write the IR here instead of the configured output')
  .option('--stdout', 'Print the IR to stdout')
  .option('--strict', 'Treat warnings as errors')
  .addOption(reporterOption())
  .action(async (root: string, options: CompileCommandOptions) => {
    exitOnFailure(await compileCommand(root, options))
  })

program
  .command('check <root>')
  .description('Validate spec files without writing output')
  .option('--strict', 'Treat warnings as errors')
  .addOption(reporterOption())
  .action(async (root: string, options: CompileCommandOptions) => {
    exitOnFailure(await checkCommand(root, options))
  })

program
  .command('watch <root>')
  .description('Recompile whenever a spec file changes')
  .option('-o, --out <file>', 'Write the IR here instead of the configured output')
  .option('--debounce <ms>', 'Quiet period before recompiling', parseMilliseconds, 300)
  .option('--strict', 'Treat warnings as errors')
  .action(async (root: string, options: WatchOptions) => {
    const result = await watchCommand(root, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
    const watcher = result.value
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        watcher.stop()
        process.exit(0)
      })
    }
  })

program
  .command('init [dir]')
  .description('Create a specml.yaml with default settings')
  .option('--force', 'Overwrite an existing specml.yaml')
  .action(async (dir: string | undefined, options: InitOptions) => {
    const result = await initCommand(dir ?? '.', options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

await program.parseAsync()
