import { describe, it, expect } from 'vitest'
import { parsePlan, planContext, toPlanDocument } from '../src/plan.js'
import { PlanParseError } from '../src/errors.js'

describe('parsePlan', () => {
  it('parses a document with a stages mapping', () => {
    const plan = parsePlan({
      backendId: 'comsol',
      modelName: 'Inductor',
      stages: {
        structure: [{ type: 'cylinder', params: { radius: '10mm' } }],
        setup: { type: 'stationary' },
      },
    })

    expect(plan).toEqual({
      backendId: 'comsol',
      modelName: 'Inductor',
      fields: {},
      stages: {
        structure: [{ type: 'cylinder', params: { radius: '10mm' } }],
        setup: [{ type: 'stationary', params: {} }],
      },
    })
  })

  it('accepts snake_case and engine aliases with top-level stages', () => {
    const plan = parsePlan({
      engine: 'ansys',
      model_name: 'Saturation',
      structure: { type: 'box', params: { dx: '10' } },
    })
    expect(plan.backendId).toBe('ansys')
    expect(plan.modelName).toBe('Saturation')
    expect(plan.stages.structure).toEqual([{ type: 'box', params: { dx: '10' } }])
  })

  it('prefers the stages mapping over a top-level stage key', () => {
    const plan = parsePlan({
      backendId: 'comsol',
      modelName: 'M',
      structure: [{ type: 'block' }],
      stages: { structure: [{ type: 'cylinder' }] },
    })
    expect(plan.stages.structure).toEqual([{ type: 'cylinder', params: {} }])
  })

  it('stringifies numeric and boolean params', () => {
    const plan = parsePlan({
      backendId: 'comsol',
      modelName: 'M',
      structure: [{ type: 'cylinder', params: { radius: 10, hollow: false } }],
    })
    expect(plan.stages.structure?.[0].params).toEqual({ radius: '10', hollow: 'false' })
  })

  it('keeps extra scalar top-level fields and ignores nested ones', () => {
    const plan = parsePlan({
      backendId: 'ansys',
      modelName: 'M',
      projectName: 'Proj',
      revision: 3,
      notes: { free: 'text' },
    })
    expect(plan.fields).toEqual({ projectName: 'Proj', revision: '3' })
    expect(planContext(plan)).toEqual({
      projectName: 'Proj',
      revision: '3',
      backendId: 'ansys',
      modelName: 'M',
    })
  })

  it('reports missing backend and model name', () => {
    try {
      parsePlan({ structure: [] })
      expect.unreachable('parsePlan should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(PlanParseError)
      if (err instanceof PlanParseError) {
        expect(err.issues).toEqual(['backendId: Required', 'modelName: Required'])
      }
    }
  })

  it('rejects items without a type', () => {
    expect(() => parsePlan({
      backendId: 'comsol',
      modelName: 'M',
      structure: [{ params: { radius: '1' } }],
    })).toThrow(PlanParseError)
  })

  it('rejects unknown stage names under stages', () => {
    expect(() => parsePlan({
      backendId: 'comsol',
      modelName: 'M',
      stages: { mesh: [{ type: 'fine' }] },
    })).toThrow(PlanParseError)
  })

  it('rejects non-object documents', () => {
    expect(() => parsePlan('not a plan')).toThrow(PlanParseError)
    expect(() => parsePlan(null)).toThrow(PlanParseError)
  })
})

describe('toPlanDocument', () => {
  it('round-trips through parsePlan', () => {
    const plan = parsePlan({
      backendId: 'comsol',
      modelName: 'M',
      projectName: 'P',
      stages: { physics: [{ type: 'magnetic_fields_mf' }] },
    })
    expect(parsePlan(toPlanDocument(plan))).toEqual(plan)
  })
})
