#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from 'commander'
import chalk from 'chalk'
import { initCommand } from './commands/init.js'
import { runCommand } from './commands/run.js'
import { compileCommand } from './commands/compile.js'
import { libraryCommand } from './commands/library.js'
import { historyCommand } from './commands/history.js'
import { VERSION } from './index.js'

function positiveInt(value: string): number {
  const n = Number.parseInt(value, 10)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('must be a positive integer')
  }
  return n
}

/** Prints the error and sets a failing exit code instead of letting it escape. */
function handled<A extends unknown[]>(fn: (...args: A) => Promise<unknown>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args)
    } catch (err) {
      console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`))
      process.exitCode = 1
    }
  }
}

const program = new Command()

program
  .name('simforge')
  .description(chalk.dim('Generate, compile, run and repair simulation experiments.'))
  .version(VERSION)

// ── init ──
program
  .command('init')
  .description('Write a commented simforge.yaml in the current directory')
  .option('-b, --backend <backend>', 'comsol | ansys | ads', 'comsol')
  .option('-f, --force', 'Overwrite an existing simforge.yaml', false)
  .action(handled((opts: { backend: string; force: boolean }) => initCommand(opts)))

// ── run ──
program
  .command('run')
  .description('Run repair cycles: design, plan, compile, execute, score')
  .option('-c, --config <path>', 'Config file (default ./simforge.yaml)')
  .option('-g, --goal <goal>', 'Override the configured goal')
  .option('-n, --cycles <n>', 'Number of cycles', positiveInt)
  .option('--dry-run', 'Use canned role replies and print the compiled script without running it', false)
  .action(handled((opts: { config?: string; goal?: string; cycles?: number; dryRun: boolean }) => runCommand(opts)))

// ── compile ──
program
  .command('compile <plan>')
  .description('Compile a plan JSON file into a backend script')
  .option('-b, --backend <backend>', 'Backend (default: the plan\'s backendId)')
  .option('--tolerant', 'Downgrade missing patterns and placeholders to warnings', false)
  .option('-o, --out <path>', 'Write the script here instead of stdout')
  .option('-c, --config <path>', 'Take compile_mode and libraries_dir from this config')
  .action(handled((plan: string, opts: { backend?: string; tolerant: boolean; out?: string; config?: string }) =>
    compileCommand(plan, opts)))

// ── library ──
program
  .command('library <backend>')
  .description('List the pattern names a backend library provides')
  .option('-d, --dir <path>', 'Libraries directory')
  .action(handled((backend: string, opts: { dir?: string }) => libraryCommand(backend, opts)))

// ── history ──
program
  .command('history')
  .description('Show recorded repair attempts, newest first')
  .option('-c, --config <path>', 'Config file (default ./simforge.yaml)')
  .option('-l, --limit <n>', 'Number of attempts', positiveInt, 20)
  .option('--cycle <id>', 'Show every attempt of one cycle, oldest first')
  .action(handled((opts: { config?: string; limit: number; cycle?: string }) => historyCommand(opts)))

await program.parseAsync()
