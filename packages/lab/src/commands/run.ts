import chalk from 'chalk'
import { renderScript } from '@simforge/patterns'
import { loadConfig } from '../config.js'
import { createLab } from '../factory.js'
import { createDryRunRoles } from '../dry-run.js'
import type { AttemptOutcomeKind, CycleResult, CycleStatus, RepairAttempt } from '../repair-loop.js'

export interface RunOpts {
  config?: string
  goal?: string
  cycles?: number
  dryRun?: boolean
}

const OUTCOME_ICONS: Record<AttemptOutcomeKind, string> = {
  success: chalk.green('✓'),
  missing_metric: chalk.yellow('∅'),
  workflow_error: chalk.red('✗'),
  compile_error: chalk.red('✗'),
  execution_error: chalk.red('✗'),
  cancelled: chalk.gray('■'),
  fatal: chalk.red('‼'),
}

const STATUS_COLORS: Record<CycleStatus, (text: string) => string> = {
  succeeded: chalk.green,
  exhausted: chalk.yellow,
  failed: chalk.red,
  cancelled: chalk.gray,
}

export async function runCommand(opts: RunOpts = {}): Promise<CycleResult[]> {
  const loaded = loadConfig(opts.config)
  // A dry run leaves no trace on disk
  const config = opts.dryRun ? { ...loaded, db_path: ':memory:' } : loaded
  const goal = opts.goal ?? config.goal

  const lab = createLab(config, {
    roles: opts.dryRun ? createDryRunRoles(config.backend, config.workflow.approval_marker) : undefined,
    onPhase: (phase, attempt) => {
      console.log(chalk.dim(`    attempt ${attempt}: ${phase}`))
    },
    onAttempt: (attempt) => printAttempt(attempt),
    onError: (err) => {
      console.error(chalk.yellow(`⚠ trajectory log: ${err.message}`))
    },
  })

  for (const warning of lab.warnings) {
    console.error(chalk.yellow(`⚠ ${warning}`))
  }

  const controller = new AbortController()
  const onSigint = () => {
    console.error(chalk.yellow('\nCancelling…'))
    controller.abort()
  }
  process.once('SIGINT', onSigint)

  try {
    if (opts.dryRun) {
      const preview = await lab.loop.preview(goal, controller.signal)
      console.log(chalk.bold(`\n  Dry run: ${config.backend} plan '${preview.plan.modelName}'\n`))
      process.stdout.write(renderScript(preview.script))
      return []
    }

    const cycles = opts.cycles ?? config.cycles
    console.log(chalk.bold(`\n  simforge · ${config.backend} · ${cycles} cycle${cycles === 1 ? '' : 's'}\n`))
    console.log(chalk.dim(`  Goal: ${goal}\n`))

    const results = await lab.loop.runCycles({
      goal,
      cycles,
      cooldownMs: config.cooldown_ms,
      signal: controller.signal,
      onCycle: (result, index) => printCycle(result, index),
    })

    if (results.some((r) => r.status === 'failed')) process.exitCode = 1
    return results
  } finally {
    process.removeListener('SIGINT', onSigint)
    lab.close()
  }
}

function printAttempt(attempt: RepairAttempt): void {
  const score = attempt.score ? chalk.dim(` score ${attempt.score.label} (${attempt.score.value})`) : ''
  const failure = attempt.failure ? chalk.dim(` [${attempt.failure}]`) : ''
  console.log(`  ${OUTCOME_ICONS[attempt.outcome]} attempt ${attempt.index} ${chalk.cyan(attempt.outcome)}${failure}${score}`)
}

function printCycle(result: CycleResult, index: number): void {
  const color = STATUS_COLORS[result.status]
  const score = result.score ? ` · ${result.score.label} (${result.score.value})` : ''
  const seconds = (result.duration_ms / 1000).toFixed(1)
  console.log(color(`\n  Cycle ${index} ${result.cycleId}: ${result.status}${score} · ${result.attempts.length} attempt(s) · ${seconds}s\n`))
  if (result.status !== 'succeeded' && result.lastDiagnostic) {
    console.log(chalk.dim(result.lastDiagnostic.split('\n').map((line) => `    ${line}`).join('\n')))
  }
}
