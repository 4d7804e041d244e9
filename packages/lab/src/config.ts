import * as fs from 'node:fs'
import * as path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { ConfigError, KNOWN_BACKENDS, formatIssues } from '@simforge/patterns'
import { DEFAULT_SCORING } from './scoring.js'
import {
  DEFAULT_APPROVAL_MARKER,
  DEFAULT_CLARIFICATION_MARKERS,
  DEFAULT_MAX_ROUNDS,
} from './workflow.js'

export const DEFAULT_CONFIG_FILE = 'simforge.yaml'
export const DEFAULT_GOAL =
  'Design a new experiment involving a Caduceus coil and a pre-stressed ferrite core.'

// ═══ Schema ═══

const count = (fallback: number) => z.coerce.number().int().positive().default(fallback)
const optionalMs = z.coerce.number().int().positive().optional()

const bandSchema = z.object({
  above: z.coerce.number(),
  label: z.string().min(1),
  value: z.coerce.number(),
})

const fixedBandSchema = z.object({
  label: z.string().min(1),
  value: z.coerce.number(),
})

const roleSchema = z.object({
  system: z.string().optional(),
  model: z.string().optional(),
  temperature: z.coerce.number().min(0).max(2).optional(),
}).strict()

export const configSchema = z.object({
  backend: z.string().transform((b) => b.toLowerCase()).refine((b) => Object.hasOwn(KNOWN_BACKENDS, b), {
    message: `must be one of: ${Object.keys(KNOWN_BACKENDS).join(', ')}`,
  }),
  goal: z.string().min(1).default(DEFAULT_GOAL),
  workdir: z.string().default('experiments'),
  script_path: z.string().default('current_run.py'),
  artifact_path: z.string().default('current_run.csv'),
  db_path: z.string().default('simforge.db'),
  libraries_dir: z.string().optional(),
  reject_collisions: z.boolean().default(false),
  max_attempts: count(5),
  candidates: count(3),
  compile_mode: z.enum(['strict', 'tolerant']).default('strict'),
  timeouts: z.object({
    role_ms: optionalMs,
    generate_ms: optionalMs,
    arbitrate_ms: optionalMs,
    execute_ms: optionalMs,
  }).strict().default({}),
  execution: z.object({
    interpreter: z.string().min(1).default('python3'),
    interpreter_args: z.array(z.string()).default([]),
    isolate: z.boolean().default(false),
    runtime: z.string().min(1).default('docker'),
    image: z.string().optional(),
  }).strict().default({}),
  scoring: z.object({
    metric: z.string().min(1).default(DEFAULT_SCORING.metric),
    bands: z.array(bandSchema).default(DEFAULT_SCORING.bands),
    floor: fixedBandSchema.default(DEFAULT_SCORING.floor),
    crash: fixedBandSchema.default(DEFAULT_SCORING.crash),
  }).strict().default({}),
  workflow: z.object({
    approval_marker: z.string().min(1).default(DEFAULT_APPROVAL_MARKER),
    clarification_markers: z.array(z.string().min(1)).default(DEFAULT_CLARIFICATION_MARKERS),
    max_rounds: count(DEFAULT_MAX_ROUNDS),
  }).strict().default({}),
  llm: z.object({
    base_url: z.string().url().default('http://localhost:11434/v1'),
    api_key: z.string().optional(),
    model: z.string().min(1).default('qwen2.5-coder:7b'),
    timeout_ms: optionalMs,
    roles: z.record(roleSchema).default({}),
  }).strict().default({}),
  cycles: count(1),
  cooldown_ms: z.coerce.number().int().min(0).default(15000),
  retry_on_missing_metric: z.boolean().default(false),
}).strict().superRefine((config, ctx) => {
  if (config.execution.isolate && !config.execution.image) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['execution', 'image'],
      message: 'an image is required when isolate is true',
    })
  }
})

export type LabConfigDocument = z.infer<typeof configSchema>

export interface LabConfig extends LabConfigDocument {
  /** Directory relative paths are resolved against: the config file's directory. */
  base_dir: string
}

// ═══ Loading ═══

export function substituteEnvVars(text: string): string {
  // Match ${VAR_NAME} and ${VAR_NAME:-default}
  return text.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
    const defaultSep = expr.indexOf(':-')
    if (defaultSep !== -1) {
      const varName = expr.slice(0, defaultSep)
      const defaultValue = expr.slice(defaultSep + 2)
      return process.env[varName] ?? defaultValue
    }

    const varName = expr.trim()
    const value = process.env[varName]
    if (value === undefined) {
      throw new ConfigError(`Environment variable ${varName} is not set (referenced in config)`)
    }
    return value
  })
}

export function parseConfig(value: unknown, baseDir: string): LabConfig {
  const parsed = configSchema.safeParse(value ?? {})
  if (!parsed.success) {
    throw new ConfigError(`Config validation failed: ${formatIssues(parsed.error.issues).join('; ')}`)
  }
  return { ...parsed.data, base_dir: baseDir }
}

export function loadConfig(configPath?: string): LabConfig {
  const resolvedPath = path.resolve(configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE))

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`Config file not found: ${resolvedPath}`)
  }

  const rawText = fs.readFileSync(resolvedPath, 'utf-8')
  const substituted = substituteEnvVars(rawText)

  let raw: unknown
  try {
    raw = parseYaml(substituted)
  } catch (err) {
    throw new ConfigError(`Failed to parse ${path.basename(resolvedPath)}: ${err instanceof Error ? err.message : String(err)}`)
  }

  return parseConfig(raw, path.dirname(resolvedPath))
}

// ═══ Paths ═══

export interface LabPaths {
  workdir: string
  scriptPath: string
  artifactPath: string
  dbPath: string
  librariesDir?: string
}

/** workdir, db_path and libraries_dir resolve against the config directory; script and artifact against workdir. */
export function resolvePaths(config: LabConfig): LabPaths {
  const workdir = path.resolve(config.base_dir, config.workdir)
  return {
    workdir,
    scriptPath: path.resolve(workdir, config.script_path),
    artifactPath: path.resolve(workdir, config.artifact_path),
    dbPath: config.db_path === ':memory:' ? config.db_path : path.resolve(config.base_dir, config.db_path),
    librariesDir: config.libraries_dir ? path.resolve(config.base_dir, config.libraries_dir) : undefined,
  }
}

// ═══ Template ═══

export function generateTemplate(backend = 'comsol'): string {
  return `# simforge configuration

# Simulation backend: ${Object.keys(KNOWN_BACKENDS).join(' | ')}
backend: ${backend}

# What the design roles should work towards
goal: "${DEFAULT_GOAL}"

# Scripts run here; script_path and artifact_path are relative to it
workdir: ./experiments
script_path: current_run.py
artifact_path: current_run.csv

# Trajectory log (SQLite)
db_path: ./simforge.db

max_attempts: 5
candidates: 3

timeouts:
  role_ms: 600000
  generate_ms: 600000
  arbitrate_ms: 120000
  execute_ms: 1800000

execution:
  interpreter: python3
  isolate: false
  # runtime: docker
  # image: simforge-runner:latest

scoring:
  metric: volts
  bands:
    - { above: 1000, label: high, value: 10 }
    - { above: 100, label: mid, value: 5 }
    - { above: 10, label: low, value: 1 }
  floor: { label: min, value: 0.1 }
  crash: { label: crash, value: -1 }

workflow:
  approval_marker: APPROVE
  clarification_markers: ["CLARIFY:", "QUESTION:", "NEED MORE INFORMATION"]
  max_rounds: 12

# Any OpenAI-compatible endpoint; the default is a local Ollama server
llm:
  base_url: \${SIMFORGE_LLM_URL:-http://localhost:11434/v1}
  api_key: \${SIMFORGE_LLM_KEY:-ollama}
  model: qwen2.5-coder:7b
  roles:
    planner:
      temperature: 0.2

cycles: 1
cooldown_ms: 15000
retry_on_missing_metric: false
`
}
