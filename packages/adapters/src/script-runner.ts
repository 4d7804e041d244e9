import { spawn, type ChildProcess } from 'node:child_process'
import * as path from 'node:path'
import { InfrastructureError } from './errors.js'
import type {
  ExecutionResult,
  RunOptions,
  ScriptRunnerConfig,
  SpawnCommand,
} from './types.js'

const DEFAULT_INTERPRETER = 'python3'
const DEFAULT_RUNTIME = 'docker'
const CONTAINER_WORKDIR = '/work'

export const TIMEOUT_EXIT_CODE = 124
export const CANCELLED_EXIT_CODE = 130

/**
 * Runs a compiled script as a child process, directly or inside a container.
 * A nonzero exit is a normal result; only a failure to start the process throws.
 */
export class ScriptRunner {
  protected config: ScriptRunnerConfig

  private runningProcesses = new Set<ChildProcess>()

  constructor(config: ScriptRunnerConfig = {}) {
    this.config = config
  }

  get workdir(): string {
    return path.resolve(this.config.cwd ?? process.cwd())
  }

  buildCommand(scriptPath: string, isolate = this.config.isolate ?? false): SpawnCommand {
    const interpreter = this.config.interpreter ?? DEFAULT_INTERPRETER
    const interpreterArgs = this.config.interpreterArgs ?? []
    const workdir = this.workdir
    const absoluteScript = path.resolve(workdir, scriptPath)

    if (!isolate) {
      return {
        command: interpreter,
        args: [...interpreterArgs, absoluteScript],
        cwd: workdir,
      }
    }

    const runtime = this.config.runtime ?? DEFAULT_RUNTIME
    if (!this.config.image) {
      throw new InfrastructureError('Isolated execution requires a container image', runtime)
    }

    const relativeScript = path.relative(workdir, absoluteScript)
    if (relativeScript.startsWith('..') || path.isAbsolute(relativeScript)) {
      throw new InfrastructureError(
        `Script ${absoluteScript} is outside the mounted working directory ${workdir}`,
        runtime,
      )
    }

    return {
      command: runtime,
      args: [
        'run', '--rm',
        '-v', `${workdir}:${CONTAINER_WORKDIR}`,
        '-w', CONTAINER_WORKDIR,
        this.config.image,
        interpreter,
        ...interpreterArgs,
        relativeScript.split(path.sep).join('/'),
      ],
      cwd: workdir,
    }
  }

  async run(scriptPath: string, options: RunOptions = {}): Promise<ExecutionResult> {
    const cmd = this.buildCommand(scriptPath, options.isolate)
    const start = performance.now()

    const artifactPath = this.config.artifactPath
      ? path.resolve(this.workdir, this.config.artifactPath)
      : undefined

    if (options.signal?.aborted) {
      return {
        exitCode: CANCELLED_EXIT_CODE,
        stdout: '',
        stderr: 'Process cancelled before start',
        timedOut: false,
        cancelled: true,
        duration_ms: 0,
        resultArtifactPath: artifactPath,
      }
    }

    const outcome = await this.spawnProcess(cmd, options.timeoutMs, options.signal)
    return {
      ...outcome,
      duration_ms: performance.now() - start,
      resultArtifactPath: artifactPath,
    }
  }

  /** Terminate every script this runner is currently executing. */
  async abortAll(): Promise<void> {
    const procs = [...this.runningProcesses]
    await Promise.all(procs.map((proc) => this.terminate(proc)))
  }

  private terminate(proc: ChildProcess): Promise<void> {
    if (proc.exitCode !== null || proc.signalCode !== null) return Promise.resolve()

    return new Promise<void>((resolve) => {
      const forceKill = setTimeout(() => {
        if (proc.exitCode === null && proc.signalCode === null) proc.kill('SIGKILL')
      }, this.config.killGraceMs ?? 1000)

      proc.once('exit', () => {
        clearTimeout(forceKill)
        resolve()
      })
      proc.kill('SIGTERM')
    })
  }

  private spawnProcess(
    cmd: SpawnCommand,
    timeoutMs?: number,
    signal?: AbortSignal,
  ): Promise<Omit<ExecutionResult, 'duration_ms' | 'resultArtifactPath'>> {
    return new Promise((resolve, reject) => {
      let proc: ChildProcess

      try {
        proc = spawn(cmd.command, cmd.args, {
          cwd: cmd.cwd,
          env: this.config.env ? { ...process.env, ...this.config.env } : process.env,
          stdio: ['ignore', 'pipe', 'pipe'],
        })
      } catch (err) {
        reject(toInfrastructureError(cmd.command, err))
        return
      }

      this.runningProcesses.add(proc)

      let stdout = ''
      let stderr = ''
      let timeoutId: ReturnType<typeof setTimeout> | undefined
      let timedOut = false
      let cancelled = false

      const appendNote = (note: string) => {
        stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}${note}`
      }

      const onAbort = () => {
        if (timedOut || cancelled) return
        cancelled = true
        appendNote('Process cancelled')
        void this.terminate(proc)
      }

      const cleanup = () => {
        if (timeoutId) clearTimeout(timeoutId)
        signal?.removeEventListener('abort', onAbort)
        this.runningProcesses.delete(proc)
      }

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString()
      })

      proc.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString()
      })

      if (timeoutMs) {
        timeoutId = setTimeout(() => {
          if (cancelled) return
          timedOut = true
          appendNote('Process timed out')
          void this.terminate(proc)
        }, timeoutMs)
      }

      signal?.addEventListener('abort', onAbort, { once: true })

      proc.on('error', (err) => {
        cleanup()
        reject(toInfrastructureError(cmd.command, err))
      })

      proc.on('close', (code, closeSignal) => {
        cleanup()
        const exitCode = timedOut
          ? TIMEOUT_EXIT_CODE
          : cancelled
            ? CANCELLED_EXIT_CODE
            : (code ?? (closeSignal ? 1 : 0))
        resolve({ exitCode, stdout, stderr, timedOut, cancelled })
      })
    })
  }
}

function toInfrastructureError(command: string, err: unknown): InfrastructureError {
  if (err instanceof InfrastructureError) return err
  const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined
  const reason = err instanceof Error ? err.message : String(err)
  return new InfrastructureError(`Cannot start ${command}: ${reason}`, command, code)
}
