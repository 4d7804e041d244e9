import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { MissingPatternError } from '@simforge/patterns'
import { initCommand } from '../src/commands/init.js'
import { compileCommand } from '../src/commands/compile.js'
import { runCommand } from '../src/commands/run.js'
import { historyCommand } from '../src/commands/history.js'
import { libraryCommand } from '../src/commands/library.js'
import { loadConfig } from '../src/config.js'
import { createDatabase } from '../src/db.js'
import { examplePlanPath } from '../src/dry-run.js'
import { TrajectoryLog } from '../src/trajectory-log.js'

const UNKNOWN_TYPE_PLAN = JSON.stringify({
  backendId: 'comsol',
  modelName: 'probe',
  stages: { structure: { type: 'mobius_strip', params: {} } },
})

describe('CLI commands', () => {
  let tmpDir: string
  const written: string[] = []

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'simforge-cli-'))
    written.length = 0
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk))
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tmpDir, { recursive: true, force: true })
  })

  // ── init ──

  it('init writes a loadable config', async () => {
    const target = await initCommand({ cwd: tmpDir, backend: 'ADS' })

    expect(target).toBe(path.join(tmpDir, 'simforge.yaml'))
    expect(loadConfig(target).backend).toBe('ads')
  })

  it('init refuses to overwrite without --force', async () => {
    await initCommand({ cwd: tmpDir })

    await expect(initCommand({ cwd: tmpDir })).rejects.toThrow('already exists')
    await expect(initCommand({ cwd: tmpDir, backend: 'ansys', force: true })).resolves.toBe(
      path.join(tmpDir, 'simforge.yaml'),
    )
  })

  it('init rejects an unknown backend', async () => {
    await expect(initCommand({ cwd: tmpDir, backend: 'spice' })).rejects.toThrow("Unknown backend 'spice'")
  })

  // ── compile ──

  it('compile writes the script to --out', async () => {
    const out = path.join(tmpDir, 'out', 'run.py')

    const text = await compileCommand(examplePlanPath('comsol'), { out })

    expect(text.startsWith('# [imports]\nimport mph\nimport pandas as pd\n\n# [init]\n')).toBe(true)
    expect(text).toContain("model = client.create('caduceus_coil')")
    expect(fs.readFileSync(out, 'utf-8')).toBe(text)
  })

  it('compile prints to stdout without --out', async () => {
    const text = await compileCommand(examplePlanPath('ansys'))
    expect(written).toEqual([text])
  })

  it('compile is strict unless asked to be tolerant', async () => {
    const planFile = path.join(tmpDir, 'plan.json')
    fs.writeFileSync(planFile, UNKNOWN_TYPE_PLAN)

    await expect(compileCommand(planFile)).rejects.toThrow(MissingPatternError)

    const text = await compileCommand(planFile, { tolerant: true })
    expect(text).toContain("# WARNING: no pattern for type 'mobius_strip' in section 'structure', skipped")
  })

  it('compile reports a missing plan file', async () => {
    await expect(compileCommand(path.join(tmpDir, 'absent.json'))).rejects.toThrow('Plan file not found')
  })

  // ── run ──

  it('run --dry-run prints the compiled example plan and leaves no database', async () => {
    const config = await initCommand({ cwd: tmpDir, backend: 'comsol' })

    const results = await runCommand({ config, dryRun: true })

    expect(results).toEqual([])
    expect(written.join('')).toContain("model = client.create('caduceus_coil')")
    expect(fs.existsSync(path.join(tmpDir, 'simforge.db'))).toBe(false)
  })

  // ── history ──

  it('history lists recorded attempts', async () => {
    const config = await initCommand({ cwd: tmpDir })
    const log = new TrajectoryLog(createDatabase(path.join(tmpDir, 'simforge.db')))
    log.record({
      cycleId: 'cycle-a',
      attempt: 1,
      outcome: 'success',
      prompt: 'p',
      transcript: 't',
      score: 10,
      scoreLabel: 'high',
    })
    log.close()

    const entries = await historyCommand({ config, limit: 5 })

    expect(entries.map((e) => [e.cycleId, e.outcome])).toEqual([['cycle-a', 'success']])
  })

  // ── library ──

  it('library lists pattern names per category', async () => {
    await libraryCommand('comsol')

    const lines = vi.mocked(console.log).mock.calls.map((call) => String(call[0]))
    expect(lines.some((line) => line.endsWith(' cylinder, block, toroid, sphere'))).toBe(true)
  })
})
