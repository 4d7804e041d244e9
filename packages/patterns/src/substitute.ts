import { UnboundPlaceholderError } from './errors.js'

export type CompileMode = 'strict' | 'tolerant'

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g

export function placeholdersIn(line: string): string[] {
  return [...line.matchAll(PLACEHOLDER)].map((match) => match[1])
}

/**
 * Replace `{name}` placeholders with the literal text of `values[name]`.
 *
 * In strict mode an unmatched placeholder throws UnboundPlaceholderError; in
 * tolerant mode it stays in the line verbatim and is reported to `onUnbound`.
 */
export function substitute(
  line: string,
  values: Record<string, string>,
  mode: CompileMode,
  where: string,
  onUnbound?: (placeholder: string) => void,
): string {
  return line.replace(PLACEHOLDER, (match: string, name: string) => {
    if (Object.hasOwn(values, name)) return values[name]
    if (mode === 'strict') {
      throw new UnboundPlaceholderError(name, line, where)
    }
    onUnbound?.(name)
    return match
  })
}
