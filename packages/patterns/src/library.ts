import * as fs from 'node:fs'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { ConfigError, PatternNotFoundError } from './errors.js'
import { formatIssues } from './plan.js'

// ═══ Category schema ═══

/** Ordered template-line lists, substituted against the plan's top-level fields. */
export const PREAMBLE_CATEGORIES = ['imports', 'init'] as const

/** typeName → template lines, substituted against each item's own params. */
export const PATTERN_CATEGORIES = [
  'geometry_shapes',
  'components',
  'circuits',
  'materials',
  'physics',
  'boundary_conditions',
  'meshes',
  'studies',
  'analyze',
  'results',
  'exports',
] as const

export type PatternCategory = (typeof PATTERN_CATEGORIES)[number]

export const KNOWN_BACKENDS: Record<string, string> = {
  comsol: 'comsol.yaml',
  ansys: 'ansys.yaml',
  ads: 'ads.yaml',
}

export const DEFAULT_LIBRARY_DIR = fileURLToPath(new URL('../libraries/', import.meta.url))

export interface Pattern {
  category: string
  typeName: string
  templateLines: readonly string[]
}

export interface PatternMatch {
  pattern: Pattern
  category: string
}

export interface PatternCollision {
  typeName: string
  /** Category that wins lookups (first in library order). */
  winner: string
  shadowed: string
}

export interface LoadLibraryOptions {
  dir?: string
  rejectCollisions?: boolean
}

const linesSchema = z.array(z.string())
const documentSchema = z.record(z.union([linesSchema, z.record(linesSchema)]))

const PATTERN_CATEGORY_SET = new Set<string>(PATTERN_CATEGORIES)

export class PatternLibrary {
  readonly backendId: string
  readonly imports: readonly string[]
  readonly init: readonly string[]
  /** Set when the library declares `analyze` as a fixed command list. */
  readonly analyzeCommands: readonly string[] | null
  readonly collisions: readonly PatternCollision[]
  private readonly categories: ReadonlyMap<string, ReadonlyMap<string, Pattern>>

  private constructor(
    backendId: string,
    preambles: { imports: string[]; init: string[]; analyze: string[] | null },
    categories: Map<string, Map<string, Pattern>>,
    collisions: PatternCollision[],
  ) {
    this.backendId = backendId
    this.imports = Object.freeze([...preambles.imports])
    this.init = Object.freeze([...preambles.init])
    this.analyzeCommands = preambles.analyze ? Object.freeze([...preambles.analyze]) : null
    this.categories = categories
    this.collisions = Object.freeze(collisions)
  }

  static fromDocument(backendId: string, doc: unknown, options: LoadLibraryOptions = {}): PatternLibrary {
    const parsed = documentSchema.safeParse(doc)
    if (!parsed.success) {
      throw new ConfigError(
        `Malformed ${backendId} library: ${formatIssues(parsed.error.issues).join('; ')}`,
        backendId,
      )
    }

    const preambles: { imports: string[]; init: string[]; analyze: string[] | null } = {
      imports: [],
      init: [],
      analyze: null,
    }
    const categories = new Map<string, Map<string, Pattern>>()
    const owners = new Map<string, string>()
    const collisions: PatternCollision[] = []

    for (const [category, content] of Object.entries(parsed.data)) {
      if (Array.isArray(content)) {
        if (category === 'imports' || category === 'init') {
          preambles[category] = content
        } else if (category === 'analyze') {
          preambles.analyze = content
        } else {
          throw new ConfigError(
            `Category '${category}' in the ${backendId} library must map type names to template lines`,
            backendId,
          )
        }
        continue
      }

      if (!PATTERN_CATEGORY_SET.has(category)) {
        throw new ConfigError(
          `Unknown category '${category}' in the ${backendId} library. ` +
          `Known: ${[...PREAMBLE_CATEGORIES, ...PATTERN_CATEGORIES].join(', ')}`,
          backendId,
        )
      }

      const patterns = new Map<string, Pattern>()
      for (const [typeName, templateLines] of Object.entries(content)) {
        patterns.set(typeName, Object.freeze({
          category,
          typeName,
          templateLines: Object.freeze([...templateLines]),
        }))

        const winner = owners.get(typeName)
        if (winner) {
          collisions.push({ typeName, winner, shadowed: category })
        } else {
          owners.set(typeName, category)
        }
      }
      categories.set(category, patterns)
    }

    if (options.rejectCollisions && collisions.length > 0) {
      const names = collisions.map((c) => `${c.typeName} (${c.winner}, ${c.shadowed})`).join(', ')
      throw new ConfigError(`Type names defined in more than one category: ${names}`, backendId)
    }

    return new PatternLibrary(backendId, preambles, categories, collisions)
  }

  /** First category (library order) that defines `typeName`, or undefined. */
  find(typeName: string): PatternMatch | undefined {
    for (const [category, patterns] of this.categories) {
      const pattern = patterns.get(typeName)
      if (pattern) return { pattern, category }
    }
    return undefined
  }

  lookup(typeName: string): PatternMatch {
    const match = this.find(typeName)
    if (!match) throw new PatternNotFoundError(typeName, this.backendId)
    return match
  }

  categoryNames(): string[] {
    return [...this.categories.keys()]
  }

  /** category → pattern names, in library order. */
  describe(): Record<string, string[]> {
    const out: Record<string, string[]> = {}
    for (const [category, patterns] of this.categories) {
      out[category] = [...patterns.keys()]
    }
    return out
  }
}

export function libraryPath(backendId: string, dir = DEFAULT_LIBRARY_DIR): string {
  const filename = KNOWN_BACKENDS[backendId.toLowerCase()]
  if (!filename) {
    throw new ConfigError(
      `Unsupported backend: ${backendId}. Must be one of: ${Object.keys(KNOWN_BACKENDS).join(', ')}`,
      backendId,
    )
  }
  return path.join(dir, filename)
}

export function loadLibrary(backendId: string, options: LoadLibraryOptions = {}): PatternLibrary {
  const id = backendId.toLowerCase()
  const filePath = libraryPath(id, options.dir)

  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Library file not found: ${filePath}`, id)
  }

  let doc: unknown
  try {
    doc = parseYaml(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(
      `Failed to parse library file ${path.basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`,
      id,
    )
  }

  return PatternLibrary.fromDocument(id, doc, options)
}
