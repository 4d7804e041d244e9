import { ConfigError, MissingPatternError } from './errors.js'
import type { PatternLibrary } from './library.js'
import { planContext } from './plan.js'
import type { Plan, PlanItem, StageName } from './plan.js'
import { substitute } from './substitute.js'
import type { CompileMode } from './substitute.js'

export const SECTION_ORDER = [
  'imports',
  'init',
  'structure',
  'materials',
  'physics',
  'setup',
  'analyze',
  'results',
] as const

export type SectionName = (typeof SECTION_ORDER)[number]

export type CompiledScript = readonly string[]

export interface CompileWarning {
  section: SectionName
  type?: string
  placeholder?: string
  message: string
}

export interface CompileReport {
  script: CompiledScript
  warnings: CompileWarning[]
}

interface Emitter {
  lines: string[]
  warnings: CompileWarning[]
  mode: CompileMode
  library: PatternLibrary
}

function warn(out: Emitter, warning: CompileWarning): void {
  out.warnings.push(warning)
  out.lines.push(`# WARNING: ${warning.message}`)
}

function emitTemplateSection(
  out: Emitter,
  section: SectionName,
  templateLines: readonly string[],
  context: Record<string, string>,
): void {
  if (templateLines.length === 0) return

  out.lines.push(`# [${section}]`)
  for (const line of templateLines) {
    out.lines.push(substitute(line, context, out.mode, section, (placeholder) => {
      out.warnings.push({ section, placeholder, message: `unbound placeholder {${placeholder}} in ${section}` })
    }))
  }
  out.lines.push('')
}

function emitItemSection(out: Emitter, section: SectionName, items: PlanItem[] | undefined): void {
  if (!items || items.length === 0) return

  out.lines.push(`# [${section}]`)
  for (const item of items) {
    const match = out.library.find(item.type)
    if (!match) {
      if (out.mode === 'strict') {
        throw new MissingPatternError(item.type, section, out.library.backendId)
      }
      warn(out, {
        section,
        type: item.type,
        message: `no pattern for type '${item.type}' in section '${section}', skipped`,
      })
      continue
    }

    const id = item.params.id
    out.lines.push(`# ${match.category}: ${item.type}${id === undefined ? '' : ` (ID: ${id})`}`)
    for (const line of match.pattern.templateLines) {
      out.lines.push(substitute(line, item.params, out.mode, `${section}/${item.type}`, (placeholder) => {
        out.warnings.push({
          section,
          type: item.type,
          placeholder,
          message: `unbound placeholder {${placeholder}} in ${section}/${item.type}`,
        })
      }))
    }
    out.lines.push('')
  }
  out.lines.push('')
}

/**
 * Compile a plan into backend script lines and report tolerant-mode warnings.
 *
 * Sections are always emitted in SECTION_ORDER, whatever order the plan's stages
 * were written in. Pure: the output depends only on the arguments.
 */
export function compileWithReport(
  backendId: string,
  plan: Plan,
  library: PatternLibrary,
  mode: CompileMode = 'strict',
): CompileReport {
  const id = backendId.toLowerCase()
  if (library.backendId !== id) {
    throw new ConfigError(`Library is for backend '${library.backendId}', not '${backendId}'`, backendId)
  }
  if (plan.backendId.toLowerCase() !== id) {
    throw new ConfigError(`Plan targets backend '${plan.backendId}', not '${backendId}'`, backendId)
  }

  const out: Emitter = { lines: [], warnings: [], mode, library }
  const context = planContext(plan)

  for (const section of SECTION_ORDER) {
    switch (section) {
      case 'imports':
        emitTemplateSection(out, section, library.imports, context)
        break
      case 'init':
        emitTemplateSection(out, section, library.init, context)
        break
      case 'analyze':
        if (library.analyzeCommands) {
          emitTemplateSection(out, section, library.analyzeCommands, context)
        } else {
          emitItemSection(out, section, plan.stages.analyze)
        }
        break
      default:
        emitItemSection(out, section, plan.stages[section satisfies StageName])
    }
  }

  return { script: Object.freeze(out.lines), warnings: out.warnings }
}

export function compile(
  backendId: string,
  plan: Plan,
  library: PatternLibrary,
  mode: CompileMode = 'strict',
): CompiledScript {
  return compileWithReport(backendId, plan, library, mode).script
}

export function renderScript(script: CompiledScript): string {
  return `${script.join('\n')}\n`
}
