import chalk from 'chalk'
import { loadLibrary } from '@simforge/patterns'

export interface LibraryOpts {
  dir?: string
}

export async function libraryCommand(backend: string, opts: LibraryOpts = {}): Promise<void> {
  const library = loadLibrary(backend, { dir: opts.dir })

  console.log(chalk.bold(`\n  ${library.backendId} pattern library\n`))
  if (library.analyzeCommands) {
    console.log(chalk.dim('    analyze: fixed command list'))
  }
  for (const [category, names] of Object.entries(library.describe())) {
    console.log(`    ${chalk.cyan(category.padEnd(20))} ${names.join(', ')}`)
  }

  for (const c of library.collisions) {
    console.log(chalk.yellow(`  ⚠ '${c.typeName}' is defined in ${c.winner} and ${c.shadowed}; lookup uses ${c.winner}`))
  }
  console.log()
}
