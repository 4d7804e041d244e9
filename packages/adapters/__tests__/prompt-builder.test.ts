import { describe, it, expect } from 'vitest'
import { buildRolePrompt } from '../src/utils/prompt-builder.js'

describe('buildRolePrompt', () => {
  it('returns the prompt alone without context', () => {
    expect(buildRolePrompt('Design a coil')).toBe('Design a coil')
  })

  it('appends labelled context sections and skips empty ones', () => {
    const prompt = buildRolePrompt('Critique the design', [
      { label: 'Proposal', content: 'two windings' },
      { label: 'Materials', content: '   ' },
      { label: 'Circuit', content: 'L = 10uH' },
    ])
    expect(prompt).toBe('Critique the design\n\nProposal\ntwo windings\n\nCircuit\nL = 10uH')
  })
})
