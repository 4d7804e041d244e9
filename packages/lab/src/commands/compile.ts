import * as fs from 'node:fs'
import * as path from 'node:path'
import chalk from 'chalk'
import {
  ConfigError,
  compileWithReport,
  loadLibrary,
  parsePlan,
  renderScript,
  type CompileMode,
} from '@simforge/patterns'
import { loadConfig, resolvePaths } from '../config.js'

export interface CompileOpts {
  backend?: string
  tolerant?: boolean
  out?: string
  /** Takes compile_mode and libraries_dir from this config file. */
  config?: string
}

export async function compileCommand(planFile: string, opts: CompileOpts = {}): Promise<string> {
  const planPath = path.resolve(planFile)
  if (!fs.existsSync(planPath)) {
    throw new ConfigError(`Plan file not found: ${planPath}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(planPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Failed to parse ${path.basename(planPath)}: ${err instanceof Error ? err.message : String(err)}`)
  }
  const plan = parsePlan(raw)

  const config = opts.config ? loadConfig(opts.config) : undefined
  const librariesDir = config ? resolvePaths(config).librariesDir : undefined
  const backend = opts.backend ?? plan.backendId
  const mode: CompileMode = opts.tolerant ? 'tolerant' : (config?.compile_mode ?? 'strict')

  const library = loadLibrary(backend, { dir: librariesDir })
  const report = compileWithReport(backend, plan, library, mode)
  const text = renderScript(report.script)

  for (const warning of report.warnings) {
    console.error(chalk.yellow(`⚠ ${warning.message}`))
  }

  if (opts.out) {
    const outPath = path.resolve(opts.out)
    fs.mkdirSync(path.dirname(outPath), { recursive: true })
    fs.writeFileSync(outPath, text)
    console.error(chalk.green(`✓ Wrote ${outPath} (${report.script.length} lines)`))
  } else {
    process.stdout.write(text)
  }

  return text
}
