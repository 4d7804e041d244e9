export const VERSION = '0.1.0'

// Plan model
export { STAGE_NAMES, parsePlan, planContext, toPlanDocument, formatIssues } from './plan.js'
export type { Plan, PlanItem, StageName } from './plan.js'

// Pattern libraries
export {
  PatternLibrary,
  loadLibrary,
  libraryPath,
  KNOWN_BACKENDS,
  DEFAULT_LIBRARY_DIR,
  PREAMBLE_CATEGORIES,
  PATTERN_CATEGORIES,
} from './library.js'
export type {
  Pattern,
  PatternMatch,
  PatternCollision,
  PatternCategory,
  LoadLibraryOptions,
} from './library.js'

// Compiler
export { compile, compileWithReport, renderScript, SECTION_ORDER } from './compiler.js'
export type { CompiledScript, CompileReport, CompileWarning, SectionName } from './compiler.js'
export { substitute, placeholdersIn } from './substitute.js'
export type { CompileMode } from './substitute.js'

// Errors
export {
  ConfigError,
  PatternNotFoundError,
  MissingPatternError,
  UnboundPlaceholderError,
  PlanParseError,
  isCompileError,
} from './errors.js'
