import type { FailureCode } from '../types.js'

interface FailurePattern {
  hints: string[]
  code: FailureCode
}

const PATTERNS: FailurePattern[] = [
  {
    hints: ['process timed out', 'timed out', 'timeout expired'],
    code: 'timeout',
  },
  {
    hints: ['ModuleNotFoundError', 'No module named', 'ImportError', 'command not found'],
    code: 'missing_module',
  },
  {
    hints: ['license', 'licence', 'FlexNet', 'lmgrd'],
    code: 'license_unavailable',
  },
  {
    hints: ['SyntaxError', 'IndentationError', 'TabError'],
    code: 'syntax_error',
  },
  {
    hints: ['did not converge', 'failed to converge', 'singular matrix', 'solver', 'failed to solve', 'meshing failed'],
    code: 'solver_error',
  },
]

/**
 * Classify a script failure by exit code and stderr.
 * Returns undefined for exit code 0.
 */
export function classifyFailure(exitCode: number, stderr: string): FailureCode | undefined {
  if (exitCode === 0) return undefined

  // 124 is what timeout(1) and ScriptRunner report for a killed run
  if (exitCode === 124) return 'timeout'

  const lower = stderr.toLowerCase()

  for (const pattern of PATTERNS) {
    for (const hint of pattern.hints) {
      if (lower.includes(hint.toLowerCase())) {
        return pattern.code
      }
    }
  }

  return 'unknown'
}
