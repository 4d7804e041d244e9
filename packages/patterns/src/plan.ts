import { z } from 'zod'
import { PlanParseError } from './errors.js'

export const STAGE_NAMES = ['structure', 'materials', 'physics', 'setup', 'analyze', 'results'] as const

export type StageName = (typeof STAGE_NAMES)[number]

export interface PlanItem {
  type: string
  params: Record<string, string>
}

export interface Plan {
  backendId: string
  modelName: string
  /** Extra top-level scalar fields, available to the preamble templates. */
  fields: Record<string, string>
  stages: Partial<Record<StageName, PlanItem[]>>
}

// ═══ Document schema ═══

// Params are substituted as text, so numbers and booleans keep their literal form.
const scalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value))

const itemSchema = z.object({
  type: z.string().trim().min(1),
  params: z.record(scalarSchema).default({}),
})

const stageSchema = z
  .union([itemSchema, z.array(itemSchema)])
  .transform((value) => (Array.isArray(value) ? value : [value]))

const stageShape = {
  structure: stageSchema.optional(),
  materials: stageSchema.optional(),
  physics: stageSchema.optional(),
  setup: stageSchema.optional(),
  analyze: stageSchema.optional(),
  results: stageSchema.optional(),
}

const identifierSchema = z.string().trim().min(1).optional()

const documentSchema = z
  .object({
    backendId: identifierSchema,
    backend_id: identifierSchema,
    engine: identifierSchema,
    modelName: identifierSchema,
    model_name: identifierSchema,
    stages: z.object(stageShape).strict().optional(),
    ...stageShape,
  })
  .passthrough()

const RESERVED_KEYS = new Set<string>([
  'backendId',
  'backend_id',
  'engine',
  'modelName',
  'model_name',
  'stages',
  ...STAGE_NAMES,
])

export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '$'}: ${issue.message}`)
}

/**
 * Validate a plan document (already decoded from JSON or YAML) and normalise it.
 *
 * Stage values may be a single item or a list of items; stages may sit under
 * `stages` or directly at the top level, with `stages` winning per stage.
 */
export function parsePlan(value: unknown): Plan {
  const result = documentSchema.safeParse(value)
  if (!result.success) {
    throw new PlanParseError(formatIssues(result.error.issues))
  }

  const doc = result.data
  const backendId = doc.backendId ?? doc.backend_id ?? doc.engine
  const modelName = doc.modelName ?? doc.model_name

  const missing: string[] = []
  if (!backendId) missing.push('backendId: Required')
  if (!modelName) missing.push('modelName: Required')
  if (!backendId || !modelName) {
    throw new PlanParseError(missing)
  }

  const stages: Plan['stages'] = {}
  for (const name of STAGE_NAMES) {
    const items = doc.stages?.[name] ?? doc[name]
    if (items) stages[name] = items
  }

  const fields: Record<string, string> = {}
  for (const [key, raw] of Object.entries(doc)) {
    if (RESERVED_KEYS.has(key)) continue
    if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
      fields[key] = String(raw)
    }
  }

  return { backendId, modelName, fields, stages }
}

/** Substitution context for imports, init and list-form analyze lines. */
export function planContext(plan: Plan): Record<string, string> {
  return {
    ...plan.fields,
    backendId: plan.backendId,
    modelName: plan.modelName,
  }
}

export function toPlanDocument(plan: Plan): Record<string, unknown> {
  return {
    backendId: plan.backendId,
    modelName: plan.modelName,
    ...plan.fields,
    stages: plan.stages,
  }
}
