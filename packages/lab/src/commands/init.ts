import * as fs from 'node:fs'
import * as path from 'node:path'
import chalk from 'chalk'
import { ConfigError, KNOWN_BACKENDS } from '@simforge/patterns'
import { DEFAULT_CONFIG_FILE, generateTemplate } from '../config.js'

export interface InitOpts {
  backend?: string
  cwd?: string
  force?: boolean
}

export async function initCommand(opts: InitOpts = {}): Promise<string> {
  const backend = (opts.backend ?? 'comsol').toLowerCase()
  if (!Object.hasOwn(KNOWN_BACKENDS, backend)) {
    throw new ConfigError(`Unknown backend '${backend}'. Expected one of: ${Object.keys(KNOWN_BACKENDS).join(', ')}`)
  }

  const dir = path.resolve(opts.cwd ?? process.cwd())
  const target = path.join(dir, DEFAULT_CONFIG_FILE)
  if (fs.existsSync(target) && !opts.force) {
    throw new ConfigError(`${DEFAULT_CONFIG_FILE} already exists in ${dir} (use --force to overwrite)`)
  }

  fs.mkdirSync(dir, { recursive: true })
  fs.writeFileSync(target, generateTemplate(backend))

  console.log(chalk.green(`✓ Wrote ${target}`))
  console.log(chalk.dim('Next: simforge run --dry-run'))
  return target
}
