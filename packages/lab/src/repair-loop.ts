import * as fs from 'node:fs'
import * as path from 'node:path'
import { nanoid } from 'nanoid'
import {
  NoValidCandidateError,
  runWithRetries,
  selectCandidate,
  type AttemptOutcome,
  type DraftRecord,
  type RetryContext,
  type SelectResult,
} from '@simforge/gates'
import {
  ConfigError,
  MissingPatternError,
  UnboundPlaceholderError,
  compile,
  isCompileError,
  parsePlan,
  renderScript,
  type CompiledScript,
  type PatternLibrary,
  type Plan,
} from '@simforge/patterns'
import {
  InfrastructureError,
  classifyFailure,
  type ExecutionResult,
  type FailureCode,
  type RoleCaller,
  type RunOptions,
} from '@simforge/adapters'
import { ARBITER_ROLE, PLANNER_ROLE, buildArbitrationPrompt, buildPlannerPrompt } from './prompts.js'
import { crashScore, scoreMetric, DEFAULT_SCORING, type Score, type ScoringPolicy } from './scoring.js'
import { readMetric } from './results.js'
import { WorkflowState, runWorkflow, type TranscriptEntry } from './workflow.js'
import type { TrajectorySink } from './trajectory-log.js'

// ═══ Types ═══

export interface ScriptExecutor {
  run(scriptPath: string, options?: RunOptions): Promise<ExecutionResult>
}

export type RepairPhase = 'generate' | 'compile' | 'execute' | 'evaluate'

export type AttemptOutcomeKind =
  | 'success'
  | 'missing_metric'
  | 'workflow_error'
  | 'compile_error'
  | 'execution_error'
  | 'cancelled'
  | 'fatal'

export interface RepairAttempt {
  /** 1-based. */
  index: number
  prompt: string
  transcript: TranscriptEntry[]
  plan?: Plan
  script?: CompiledScript
  execution?: ExecutionResult
  failure?: FailureCode
  score?: Score
  diagnostic?: string
  outcome: AttemptOutcomeKind
  duration_ms: number
}

export type CycleStatus = 'succeeded' | 'exhausted' | 'failed' | 'cancelled'

export interface CycleResult {
  cycleId: string
  status: CycleStatus
  score?: Score
  attempts: RepairAttempt[]
  lastDiagnostic?: string
  duration_ms: number
}

export interface RepairTimeouts {
  role_ms?: number
  generate_ms?: number
  arbitrate_ms?: number
  execute_ms?: number
}

export interface WorkflowSettings {
  approvalMarker?: string
  clarificationMarkers?: string[]
  maxRounds?: number
}

export interface RepairLoopOptions {
  backendId: string
  library: PatternLibrary
  roles: RoleCaller
  runner: ScriptExecutor
  /** Fixed location the compiled script is written to, overwritten every attempt. */
  scriptPath: string
  /** Result table the script is expected to write. */
  artifactPath: string
  scoring?: ScoringPolicy
  maxAttempts?: number
  /** K for best-of-K plan selection. */
  candidates?: number
  isolate?: boolean
  timeouts?: RepairTimeouts
  workflow?: WorkflowSettings
  /** Retry instead of stopping when a zero-exit run leaves no readable metric. */
  retryOnMissingMetric?: boolean
  sink?: TrajectorySink
  onAttempt?: (attempt: RepairAttempt, cycleId: string) => void
  onPhase?: (phase: RepairPhase, attempt: number, cycleId: string) => void
  onError?: (error: Error) => void
  createId?: () => string
}

export interface RunCycleOptions {
  goal: string
  signal?: AbortSignal
}

export interface RunCyclesOptions extends RunCycleOptions {
  cycles: number
  cooldownMs?: number
  onCycle?: (result: CycleResult, index: number) => void
}

export interface PlanPreview {
  plan: Plan
  script: CompiledScript
  prompt: string
  transcript: TranscriptEntry[]
  selection: SelectResult<Plan>
}

const DEFAULT_MAX_ATTEMPTS = 5
const DEFAULT_CANDIDATES = 3
const STDERR_TAIL_LINES = 40

type Step = AttemptOutcome<RepairAttempt>

// ═══ Loop ═══

/**
 * generate → compile → execute → evaluate, retried with a diagnostic until a
 * run exits 0 or the attempt budget is spent. Never throws for a failed cycle;
 * every outcome ends up in the returned CycleResult.
 */
export class RepairLoop {
  readonly plannerPrompt: string

  private options: RepairLoopOptions
  private scoring: ScoringPolicy
  private backendId: string

  constructor(options: RepairLoopOptions) {
    this.options = options
    this.scoring = options.scoring ?? DEFAULT_SCORING
    this.backendId = options.backendId.toLowerCase()

    if (options.library.backendId !== this.backendId) {
      throw new ConfigError(
        `Library is for backend '${options.library.backendId}', not '${options.backendId}'`,
        options.backendId,
      )
    }

    this.plannerPrompt = buildPlannerPrompt(this.backendId, options.library)
  }

  async runCycle(options: RunCycleOptions): Promise<CycleResult> {
    const cycleId = (this.options.createId ?? nanoid)()
    const started = performance.now()
    const attempts: RepairAttempt[] = []
    const { signal } = options

    const result = await runWithRetries<RepairAttempt>({
      retry: { max: this.options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS },
      shouldContinue: () => !signal?.aborted,
      run: (ctx) => this.attempt(cycleId, options.goal, ctx, signal),
      onAttempt: async (record) => {
        const attempt = record.outcome.value
        attempts.push(attempt)
        this.options.onAttempt?.(attempt, cycleId)
        await this.forward(cycleId, attempt)
      },
    })

    const last = attempts.at(-1)
    let status: CycleStatus
    switch (result.status) {
      case 'done':
        status = 'succeeded'
        break
      case 'exhausted':
        status = 'exhausted'
        break
      case 'stopped':
        status = 'cancelled'
        break
      default:
        status = last?.outcome === 'cancelled' ? 'cancelled' : 'failed'
    }

    return {
      cycleId,
      status,
      score: status === 'succeeded' ? last?.score : undefined,
      attempts,
      lastDiagnostic: last?.diagnostic,
      duration_ms: performance.now() - started,
    }
  }

  /** Run `cycles` cycles one after another with a cooldown between them. */
  async runCycles(options: RunCyclesOptions): Promise<CycleResult[]> {
    const results: CycleResult[] = []

    for (let index = 1; index <= options.cycles; index++) {
      if (options.signal?.aborted) break

      const result = await this.runCycle({ goal: options.goal, signal: options.signal })
      results.push(result)
      options.onCycle?.(result, index)

      if (index < options.cycles && options.cooldownMs) {
        await cooldown(options.cooldownMs, options.signal)
      }
    }

    return results
  }

  /** One generate and compile pass, without executing anything. Errors propagate. */
  async preview(goal: string, signal?: AbortSignal): Promise<PlanPreview> {
    const transcript: TranscriptEntry[] = []
    const { plan, selection } = await this.generatePlan(goal, undefined, transcript, signal)
    const script = compile(this.backendId, plan, this.options.library, 'strict')
    return { plan, script, prompt: this.plannerPrompt, transcript, selection }
  }

  // ── Attempt ──

  private async attempt(
    cycleId: string,
    goal: string,
    ctx: RetryContext,
    signal?: AbortSignal,
  ): Promise<Step> {
    const started = performance.now()
    const record: RepairAttempt = {
      index: ctx.attempt,
      prompt: this.plannerPrompt,
      transcript: [],
      outcome: 'fatal',
      duration_ms: 0,
    }

    const finish = (
      status: Step['status'],
      outcome: AttemptOutcomeKind,
      diagnostic?: string,
    ): Step => {
      record.outcome = outcome
      if (diagnostic !== undefined) record.diagnostic = diagnostic
      record.duration_ms = performance.now() - started
      if (status === 'retry') {
        return { status, value: record, feedback: diagnostic ?? `Attempt ${record.index} failed` }
      }
      return { status, value: record }
    }

    try {
      return await this.steps(cycleId, goal, ctx, record, finish, signal)
    } catch (err) {
      return finish('terminal', 'fatal', `Attempt ${record.index} aborted: ${errorMessage(err)}`)
    }
  }

  private async steps(
    cycleId: string,
    goal: string,
    ctx: RetryContext,
    record: RepairAttempt,
    finish: (status: Step['status'], outcome: AttemptOutcomeKind, diagnostic?: string) => Step,
    signal?: AbortSignal,
  ): Promise<Step> {
    const n = record.index

    // GENERATE
    if (signal?.aborted) return finish('terminal', 'cancelled', 'Cancelled before generation')
    this.options.onPhase?.('generate', n, cycleId)

    let plan: Plan
    try {
      plan = (await this.generatePlan(goal, ctx.feedback, record.transcript, signal)).plan
      record.plan = plan
    } catch (err) {
      if (signal?.aborted) return finish('terminal', 'cancelled', 'Cancelled during generation')
      if (err instanceof NoValidCandidateError || err instanceof ConfigError) {
        return finish('terminal', 'fatal', `Attempt ${n}: ${err.message}`)
      }
      return finish('retry', 'workflow_error', `Attempt ${n}: the design workflow failed. ${errorMessage(err)}`)
    }

    // COMPILE
    this.options.onPhase?.('compile', n, cycleId)

    if (plan.backendId.toLowerCase() !== this.backendId) {
      return finish(
        'retry',
        'compile_error',
        `Attempt ${n}: the plan targets backend '${plan.backendId}', but this lab runs '${this.backendId}'. ` +
        `Set "backendId" to "${this.backendId}".`,
      )
    }

    try {
      record.script = compile(this.backendId, plan, this.options.library, 'strict')
    } catch (err) {
      if (isCompileError(err)) return finish('retry', 'compile_error', compileDiagnostic(n, err))
      throw err
    }

    this.writeScript(record.script)

    // EXECUTE
    this.options.onPhase?.('execute', n, cycleId)

    let execution: ExecutionResult
    try {
      execution = await this.options.runner.run(this.options.scriptPath, {
        isolate: this.options.isolate,
        timeoutMs: this.options.timeouts?.execute_ms,
        signal,
      })
    } catch (err) {
      if (err instanceof InfrastructureError) {
        return finish('terminal', 'fatal', `Attempt ${n}: ${err.message}`)
      }
      throw err
    }
    record.execution = execution

    if (execution.cancelled) return finish('terminal', 'cancelled', 'Cancelled during execution')

    if (execution.exitCode !== 0) {
      record.failure = classifyFailure(execution.exitCode, execution.stderr)
      return finish('retry', 'execution_error', executionDiagnostic(n, execution, record.failure))
    }

    // EVALUATE
    this.options.onPhase?.('evaluate', n, cycleId)

    const metric = readMetric(this.options.artifactPath, this.scoring.metric)
    if (metric === undefined) {
      record.score = crashScore(this.scoring)
      const diagnostic =
        `Attempt ${n}: the script exited 0 but left no readable '${this.scoring.metric}' value ` +
        `in ${path.basename(this.options.artifactPath)}. Make the results stage write that column.`
      return this.options.retryOnMissingMetric
        ? finish('retry', 'missing_metric', diagnostic)
        : finish('done', 'missing_metric', diagnostic)
    }

    record.score = scoreMetric(this.scoring, metric)
    return finish('done', 'success')
  }

  private async generatePlan(
    goal: string,
    diagnostic: string | undefined,
    transcript: TranscriptEntry[],
    signal?: AbortSignal,
  ): Promise<{ plan: Plan; selection: SelectResult<Plan> }> {
    const { roles, timeouts, workflow } = this.options

    const onDraft = (draft: DraftRecord) => {
      transcript.push({
        state: WorkflowState.PLAN_EMISSION,
        role: PLANNER_ROLE,
        content: draft.raw ?? `[draft ${draft.index} failed: ${draft.reason ?? 'unknown'}]`,
      })
    }

    const { value: selection } = await runWorkflow({
      roles,
      goal,
      diagnostic,
      signal,
      approvalMarker: workflow?.approvalMarker,
      clarificationMarkers: workflow?.clarificationMarkers,
      maxRounds: workflow?.maxRounds,
      roleTimeoutMs: timeouts?.role_ms,
      onMessage: (entry) => transcript.push(entry),
      emit: (packet) => selectCandidate<Plan>({
        prompt: this.plannerPrompt,
        k: this.options.candidates ?? DEFAULT_CANDIDATES,
        generate: (prompt) => roles.call(PLANNER_ROLE, prompt, packet, signal),
        arbitrate: (candidates) => roles.call(ARBITER_ROLE, buildArbitrationPrompt(candidates), [], signal),
        parse: parsePlan,
        timeouts: { generate_ms: timeouts?.generate_ms, arbitrate_ms: timeouts?.arbitrate_ms },
        onDraft,
      }),
    })

    return { plan: selection.value, selection }
  }

  private writeScript(script: CompiledScript): void {
    fs.mkdirSync(path.dirname(this.options.scriptPath), { recursive: true })
    fs.writeFileSync(this.options.scriptPath, renderScript(script))
    // A stale artifact from the previous attempt must not be scored
    fs.rmSync(this.options.artifactPath, { force: true })
  }

  private async forward(cycleId: string, attempt: RepairAttempt): Promise<void> {
    if (!this.options.sink) return
    const score = attempt.outcome === 'cancelled'
      ? null
      : (attempt.score?.value ?? this.scoring.crash.value)

    try {
      await this.options.sink.record({
        cycleId,
        attempt: attempt.index,
        outcome: attempt.outcome,
        prompt: attempt.prompt,
        transcript: renderTranscript(attempt.transcript),
        diagnostic: attempt.diagnostic,
        score,
        scoreLabel: attempt.outcome === 'cancelled'
          ? undefined
          : (attempt.score?.label ?? this.scoring.crash.label),
      })
    } catch (err) {
      this.options.onError?.(err instanceof Error ? err : new Error(String(err)))
    }
  }
}

// ═══ Helpers ═══

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function renderTranscript(entries: TranscriptEntry[]): string {
  return entries.map((e) => `[${e.role}] ${e.content}`).join('\n\n')
}

function tail(text: string, lines: number): string {
  return text.trimEnd().split('\n').slice(-lines).join('\n')
}

function compileDiagnostic(attempt: number, err: MissingPatternError | UnboundPlaceholderError): string {
  if (err instanceof MissingPatternError) {
    return (
      `Attempt ${attempt}: plan compilation failed. ${err.message}. ` +
      `Use only pattern names from the library for the '${err.section}' stage.`
    )
  }
  return (
    `Attempt ${attempt}: plan compilation failed. ${err.message}. ` +
    `Give '${err.placeholder}' a value in that item's params.`
  )
}

function executionDiagnostic(attempt: number, execution: ExecutionResult, failure: FailureCode | undefined): string {
  const lines = [
    `Attempt ${attempt}: the compiled script exited with code ${execution.exitCode} (${failure ?? 'unknown'}).`,
  ]
  const output = tail(execution.stderr || execution.stdout, STDERR_TAIL_LINES)
  if (output) lines.push('Output:', output)
  lines.push('Change the plan so that the script runs.')
  return lines.join('\n')
}

function cooldown(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const done = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })
}
