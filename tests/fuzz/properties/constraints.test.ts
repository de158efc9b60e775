/**
 * Property tests for the constraint language.
 *
 * Tests the laws for:
 * - Polish printing and parsing (round trip, idempotence)
 * - Infix printing
 * - Translation fallback
 * - Synthesized constraints
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { constraintGen, formulaGen, explicitSetGen, mixedFormulaGen } from '../generators/constraints'
import {
  constraintEquals,
  evaluateConstraint,
  explicitSet,
  isAlways,
} from '../../../src/constraint-ast'
import { parsePolish, toPolish } from '../../../src/polish'
import { toInfix } from '../../../src/infix'
import { translateConstraint } from '../../../src/translator'
import { createRandomSource } from '../../../src/random'
import { synthesizeConstraint, DEFAULT_CONSTRAINT_WEIGHTS } from '../../../src/constraint-synthesis'

// ============================================================================
// Polish Round Trip
// ============================================================================

describe('Polish round trip', () => {
  it('parsePolish(toPolish(c)) equals c', () => {
    fc.assert(
      fc.property(constraintGen(), (c) => {
        expect(constraintEquals(parsePolish(toPolish(c)), c)).toBe(true)
      })
    )
  })

  it('preserves evaluation at every time step', () => {
    fc.assert(
      fc.property(formulaGen(), fc.nat({ max: 200 }), (c, t) => {
        expect(evaluateConstraint(parsePolish(toPolish(c)), t)).toBe(evaluateConstraint(c, t))
      })
    )
  })

  it('keeps evaluation when always sits anywhere in the tree', () => {
    fc.assert(
      fc.property(mixedFormulaGen(), fc.nat({ max: 50 }), (c, t) => {
        const read = parsePolish(toPolish(c))
        expect(constraintEquals(read, c)).toBe(true)
        expect(evaluateConstraint(read, t)).toBe(evaluateConstraint(c, t))
      })
    )
  })

  it('survives an extra layer of parentheses', () => {
    fc.assert(
      fc.property(formulaGen(3), (c) => {
        expect(constraintEquals(parsePolish(`(${toPolish(c)})`), c)).toBe(true)
      })
    )
  })

  it('printing is idempotent', () => {
    fc.assert(
      fc.property(constraintGen(), (c) => {
        expect(toPolish(c)).toBe(toPolish(c))
        expect(toInfix(c)).toBe(toInfix(c))
      })
    )
  })
})

// ============================================================================
// Infix
// ============================================================================

describe('Infix printing', () => {
  it('is empty exactly for always', () => {
    fc.assert(
      fc.property(constraintGen(), (c) => {
        expect(toInfix(c) === '').toBe(isAlways(c))
      })
    )
  })

  it('explicit sets print one equality per member', () => {
    fc.assert(
      fc.property(explicitSetGen(), (c) => {
        if (c.type !== 'explicitSet') return
        expect(toInfix(c).split(' || ')).toEqual(c.times.map((t) => `time == ${t}`))
      })
    )
  })

  it('explicit set membership matches evaluation', () => {
    fc.assert(
      fc.property(fc.array(fc.nat({ max: 30 }), { minLength: 1 }), fc.nat({ max: 30 }), (times, t) => {
        expect(evaluateConstraint(explicitSet(times), t)).toBe(times.includes(t))
      })
    )
  })
})

// ============================================================================
// Translation
// ============================================================================

describe('Translation', () => {
  it('translates every printed formula without a warning', () => {
    fc.assert(
      fc.property(constraintGen(), (c) => {
        const outcome = translateConstraint({ id: 'x', polish: toPolish(c) })
        expect(outcome.warning).toBeUndefined()
        expect(outcome.infix).toBe(toInfix(c))
      })
    )
  })

  it('never throws on arbitrary text', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 40 }), (text) => {
        const outcome = translateConstraint({ id: 'x', polish: text })
        if (outcome.warning) {
          expect(isAlways(outcome.constraint)).toBe(true)
          expect(outcome.infix).toBe('')
        }
      })
    )
  })
})

// ============================================================================
// Synthesis
// ============================================================================

describe('Synthesized constraints', () => {
  it('round-trip for every seed', () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const random = createRandomSource(seed)
        for (let i = 0; i < 10; i++) {
          const c = synthesizeConstraint(random, { weights: { ...DEFAULT_CONSTRAINT_WEIGHTS, explicitSet: 0.1, negation: 0.1 } })
          expect(constraintEquals(parsePolish(toPolish(c)), c)).toBe(true)
        }
      })
    )
  })
})
