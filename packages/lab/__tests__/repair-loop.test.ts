import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { ConfigError, loadLibrary, type PatternLibrary } from '@simforge/patterns'
import {
  InfrastructureError,
  ScriptedRoleCaller,
  type ExecutionResult,
  type RunOptions,
  type ScriptedResponse,
} from '@simforge/adapters'
import { RepairLoop, type RepairLoopOptions, type ScriptExecutor } from '../src/repair-loop.js'
import type { TrajectoryInput } from '../src/trajectory-log.js'

const GOAL = 'Measure the induced voltage of a toroidal coil'
const EXAMPLE_PLAN = fs.readFileSync(new URL('../examples/comsol-plan.json', import.meta.url), 'utf-8')
const GOOD_PLAN = '```json\n' + EXAMPLE_PLAN + '\n```'
const BAD_PLAN = JSON.stringify({
  backendId: 'comsol',
  modelName: 'probe',
  stages: { structure: { type: 'mobius_strip', params: {} } },
})

interface FakeRun {
  exitCode?: number
  stderr?: string
  cancelled?: boolean
  /** Written to the artifact path before the run returns. */
  csv?: string
  /** Leaves a directory where the artifact should be. */
  artifactDir?: boolean
}

class FakeRunner implements ScriptExecutor {
  readonly calls: Array<{ scriptPath: string; options?: RunOptions }> = []

  constructor(private artifactPath: string, private runs: FakeRun[]) {}

  async run(scriptPath: string, options?: RunOptions): Promise<ExecutionResult> {
    this.calls.push({ scriptPath, options })
    const run = this.runs[Math.min(this.calls.length - 1, this.runs.length - 1)]
    if (run.csv !== undefined) fs.writeFileSync(this.artifactPath, run.csv)
    if (run.artifactDir) fs.mkdirSync(this.artifactPath)

    return {
      exitCode: run.exitCode ?? 0,
      stdout: '',
      stderr: run.stderr ?? '',
      timedOut: false,
      cancelled: run.cancelled ?? false,
      duration_ms: 1,
    }
  }
}

function scriptedRoles(planner: ScriptedResponse = GOOD_PLAN, overrides: Record<string, ScriptedResponse> = {}) {
  return new ScriptedRoleCaller({
    proposer: 'Hypothesis: a ferrite core raises the coil voltage',
    materials: 'Ferrite, permeability 2000',
    circuit: '1 A drive, 100 turns',
    critic: (prompt) => (prompt.includes('--- OPTION') ? '0' : 'APPROVE'),
    planner,
    ...overrides,
  })
}

describe('RepairLoop', () => {
  let tmpDir: string
  let scriptPath: string
  let artifactPath: string
  let library: PatternLibrary

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'simforge-loop-'))
    scriptPath = path.join(tmpDir, 'current_run.py')
    artifactPath = path.join(tmpDir, 'current_run.csv')
    library = loadLibrary('comsol')
  })

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true })
  })

  function createLoop(runner: ScriptExecutor, options: Partial<RepairLoopOptions> = {}): RepairLoop {
    let n = 0
    return new RepairLoop({
      backendId: 'comsol',
      library,
      roles: scriptedRoles(),
      runner,
      scriptPath,
      artifactPath,
      maxAttempts: 3,
      candidates: 1,
      createId: () => `cycle-${++n}`,
      ...options,
    })
  }

  it('refuses a library for another backend', () => {
    const runner = new FakeRunner(artifactPath, [{}])
    expect(() => createLoop(runner, { backendId: 'ansys' })).toThrow(ConfigError)
  })

  it('scores a successful first attempt', async () => {
    const runner = new FakeRunner(artifactPath, [{ csv: 'freq,volts\n1e5,12\n1e6,1500\n' }])
    const records: TrajectoryInput[] = []
    const loop = createLoop(runner, { sink: { record: (entry) => { records.push(entry) } } })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.cycleId).toBe('cycle-1')
    expect(result.status).toBe('succeeded')
    expect(result.score).toEqual({ label: 'high', value: 10, metric: 1500, crash: false })
    expect(result.attempts).toHaveLength(1)
    expect(result.attempts[0].outcome).toBe('success')
    expect(runner.calls).toEqual([{ scriptPath, options: { isolate: undefined, timeoutMs: undefined, signal: undefined } }])

    const script = fs.readFileSync(scriptPath, 'utf-8')
    expect(script).toContain('# [structure]')
    expect(script.endsWith('\n')).toBe(true)

    expect(records).toHaveLength(1)
    expect(records[0]).toMatchObject({ cycleId: 'cycle-1', attempt: 1, outcome: 'success', score: 10, scoreLabel: 'high' })
    expect(records[0].transcript).toContain('[proposer] Hypothesis: a ferrite core raises the coil voltage')
  })

  it('runs exactly maxAttempts attempts when every run fails', async () => {
    const runner = new FakeRunner(artifactPath, [{ exitCode: 1, stderr: "ModuleNotFoundError: No module named 'mph'" }])
    const roles = scriptedRoles()
    const loop = createLoop(runner, { roles })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('exhausted')
    expect(result.score).toBeUndefined()
    expect(runner.calls).toHaveLength(3)
    expect(result.attempts.map((a) => a.outcome)).toEqual(['execution_error', 'execution_error', 'execution_error'])
    expect(result.attempts.map((a) => a.failure)).toEqual(['missing_module', 'missing_module', 'missing_module'])
    expect(result.lastDiagnostic).toBe(
      'Attempt 3: the compiled script exited with code 1 (missing_module).\n' +
      "Output:\nModuleNotFoundError: No module named 'mph'\n" +
      'Change the plan so that the script runs.',
    )

    // The previous attempt's diagnostic reaches the proposer of the next one
    const secondProposal = roles.callsFor('proposer')[1]
    expect(secondProposal.context[0].label).toBe('Previous attempt failed')
    expect(secondProposal.context[0].content).toContain('Attempt 1: the compiled script exited with code 1')
  })

  it('retries a compile error with the missing type in the diagnostic', async () => {
    const runner = new FakeRunner(artifactPath, [{ csv: 'volts\n250\n' }])
    const roles = scriptedRoles([BAD_PLAN, GOOD_PLAN])
    const loop = createLoop(runner, { roles })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('succeeded')
    expect(result.score).toMatchObject({ label: 'mid', value: 5 })
    expect(result.attempts.map((a) => a.outcome)).toEqual(['compile_error', 'success'])
    expect(result.attempts[0].diagnostic).toBe(
      "Attempt 1: plan compilation failed. Type 'mobius_strip' in section 'structure' has no pattern in the comsol library. " +
      "Use only pattern names from the library for the 'structure' stage.",
    )
    expect(runner.calls).toHaveLength(1)

    const secondPlanner = roles.callsFor('planner')[1]
    expect(secondPlanner.context.at(-1)).toEqual({
      label: 'Previous attempt failed',
      content: result.attempts[0].diagnostic,
    })
  })

  it('stops with the crash score when a clean run leaves no metric', async () => {
    fs.writeFileSync(artifactPath, 'volts\n9999\n')
    const runner = new FakeRunner(artifactPath, [{}])
    const loop = createLoop(runner)

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('succeeded')
    expect(result.score).toEqual({ label: 'crash', value: -1, crash: true })
    expect(result.attempts).toHaveLength(1)
    expect(result.attempts[0].outcome).toBe('missing_metric')
    expect(fs.existsSync(artifactPath)).toBe(false)
  })

  it('scores an unreadable artifact as a crash', async () => {
    const runner = new FakeRunner(artifactPath, [{ artifactDir: true }])
    const loop = createLoop(runner)

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('succeeded')
    expect(result.score).toEqual({ label: 'crash', value: -1, crash: true })
    expect(result.attempts.map((a) => a.outcome)).toEqual(['missing_metric'])
  })

  it('retries a missing metric when configured to', async () => {
    const runner = new FakeRunner(artifactPath, [{}, { csv: 'volts\n50\n' }])
    const loop = createLoop(runner, { retryOnMissingMetric: true })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.attempts.map((a) => a.outcome)).toEqual(['missing_metric', 'success'])
    expect(result.score).toMatchObject({ label: 'low', value: 1 })
  })

  it('retries a failing design workflow', async () => {
    const runner = new FakeRunner(artifactPath, [{ csv: 'volts\n1\n' }])
    const roles = scriptedRoles(GOOD_PLAN, {
      proposer: () => {
        throw new Error('model offline')
      },
    })
    const loop = createLoop(runner, { roles, maxAttempts: 2 })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('exhausted')
    expect(result.attempts.map((a) => a.outcome)).toEqual(['workflow_error', 'workflow_error'])
    expect(result.lastDiagnostic).toBe('Attempt 2: the design workflow failed. model offline')
    expect(runner.calls).toHaveLength(0)
  })

  it('fails the cycle when no plan candidate parses', async () => {
    const runner = new FakeRunner(artifactPath, [{}])
    const loop = createLoop(runner, { roles: scriptedRoles('I would rather not') })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('failed')
    expect(result.attempts).toHaveLength(1)
    expect(result.attempts[0].outcome).toBe('fatal')
    expect(result.attempts[0].transcript.at(-1)).toMatchObject({ role: 'planner', content: 'I would rather not' })
  })

  it('fails the cycle on an infrastructure error without retrying', async () => {
    const runner: ScriptExecutor = {
      run: () => Promise.reject(new InfrastructureError('spawn python3 ENOENT', 'python3', 'ENOENT')),
    }
    const loop = createLoop(runner)

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('failed')
    expect(result.attempts).toHaveLength(1)
    expect(result.lastDiagnostic).toBe('Attempt 1: spawn python3 ENOENT')
  })

  it('reports a cancelled run as cancelled with no score in the log', async () => {
    const runner = new FakeRunner(artifactPath, [{ exitCode: 130, cancelled: true }])
    const records: TrajectoryInput[] = []
    const loop = createLoop(runner, { sink: { record: (entry) => { records.push(entry) } } })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('cancelled')
    expect(result.attempts[0].outcome).toBe('cancelled')
    expect(records[0].score).toBeNull()
    expect(records[0].scoreLabel).toBeUndefined()
  })

  it('does not start when the signal is already aborted', async () => {
    const runner = new FakeRunner(artifactPath, [{}])
    const controller = new AbortController()
    controller.abort()
    const roles = scriptedRoles()
    const loop = createLoop(runner, { roles })

    const result = await loop.runCycle({ goal: GOAL, signal: controller.signal })

    expect(result.status).toBe('cancelled')
    expect(roles.calls).toHaveLength(0)
    expect(runner.calls).toHaveLength(0)
  })

  it('reports sink failures through onError and keeps going', async () => {
    const runner = new FakeRunner(artifactPath, [{ csv: 'volts\n1500\n' }])
    const onError = vi.fn((_err: Error) => undefined)
    const loop = createLoop(runner, {
      sink: {
        record: () => {
          throw new Error('database is locked')
        },
      },
      onError,
    })

    const result = await loop.runCycle({ goal: GOAL })

    expect(result.status).toBe('succeeded')
    expect(onError).toHaveBeenCalledTimes(1)
    expect(onError.mock.calls[0][0].message).toBe('database is locked')
  })

  it('reports phases in order', async () => {
    const runner = new FakeRunner(artifactPath, [{ csv: 'volts\n1500\n' }])
    const phases: string[] = []
    const loop = createLoop(runner, { onPhase: (phase, attempt) => phases.push(`${attempt}:${phase}`) })

    await loop.runCycle({ goal: GOAL })

    expect(phases).toEqual(['1:generate', '1:compile', '1:execute', '1:evaluate'])
  })

  it('runs several cycles one after another', async () => {
    const runner = new FakeRunner(artifactPath, [{ csv: 'volts\n1500\n' }])
    const seen: number[] = []
    const loop = createLoop(runner)

    const results = await loop.runCycles({
      goal: GOAL,
      cycles: 2,
      cooldownMs: 1,
      onCycle: (_result, index) => seen.push(index),
    })

    expect(results.map((r) => r.cycleId)).toEqual(['cycle-1', 'cycle-2'])
    expect(results.map((r) => r.status)).toEqual(['succeeded', 'succeeded'])
    expect(seen).toEqual([1, 2])
  })

  it('previews a compiled plan without executing it', async () => {
    const runner = new FakeRunner(artifactPath, [{}])
    const loop = createLoop(runner)

    const preview = await loop.preview(GOAL)

    expect(preview.plan.modelName).toBe('caduceus_coil')
    expect(preview.script).toContain('# [results]')
    expect(preview.prompt).toBe(loop.plannerPrompt)
    expect(runner.calls).toHaveLength(0)
  })
})
