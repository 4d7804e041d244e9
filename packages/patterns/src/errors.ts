export class ConfigError extends Error {
  readonly backendId?: string

  constructor(message: string, backendId?: string) {
    super(message)
    this.name = 'ConfigError'
    this.backendId = backendId
  }
}

export class PatternNotFoundError extends Error {
  readonly typeName: string

  constructor(typeName: string, backendId: string) {
    super(`No pattern named '${typeName}' in the ${backendId} library`)
    this.name = 'PatternNotFoundError'
    this.typeName = typeName
  }
}

export class MissingPatternError extends Error {
  readonly type: string
  readonly section: string

  constructor(type: string, section: string, backendId: string) {
    super(`Type '${type}' in section '${section}' has no pattern in the ${backendId} library`)
    this.name = 'MissingPatternError'
    this.type = type
    this.section = section
  }
}

export class UnboundPlaceholderError extends Error {
  readonly placeholder: string
  readonly line: string
  readonly where: string

  constructor(placeholder: string, line: string, where: string) {
    super(`Placeholder {${placeholder}} is not bound (${where}): ${line}`)
    this.name = 'UnboundPlaceholderError'
    this.placeholder = placeholder
    this.line = line
    this.where = where
  }
}

export class PlanParseError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid plan: ${issues.join('; ')}`)
    this.name = 'PlanParseError'
    this.issues = issues
  }
}

export function isCompileError(err: unknown): err is MissingPatternError | UnboundPlaceholderError {
  return err instanceof MissingPatternError || err instanceof UnboundPlaceholderError
}
