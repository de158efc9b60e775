/**
 * Segment 4: Translator Tests
 *
 * Polish -> infix translation, the `always` fallback for unparseable
 * items, and batch accounting.
 */

import { describe, it, expect } from 'vitest'
import { polishToInfix, translateConstraint, translateBatch } from '../src/translator'
import { MalformedConstraintError } from '../src/errors'
import { always, mod } from '../src/constraint-ast'

describe('Segment 4: Translator', () => {
  // ========================================================================
  // Translation Table
  // ========================================================================

  describe('polishToInfix', () => {
    it.each([
      ['(= (mod t 3) 0)', 'time % 3 == 0'],
      ['(0,3,7)', 'time == 0 || time == 3 || time == 7'],
      ['(not (= (mod t 4) 0))', '!(time % 4 == 0)'],
      ['', ''],
      ['(>= t 5)', 'time >= 5'],
      ['(and (>= t 2) (<= t 9))', '(time >= 2) && (time <= 9)'],
      ['(or (= (mod t 2) 0) (= t 7))', '(time % 2 == 0) || (time == 7)'],
      ['((= (mod t 2) 1))', 'time % 2 == 1'],
    ])('translates %j to %j', (polish, infix) => {
      expect(polishToInfix(polish)).toBe(infix)
    })

    it('throws on malformed text', () => {
      expect(() => polishToInfix('(xor (>= t 1) (< t 2))')).toThrow(MalformedConstraintError)
    })
  })

  // ========================================================================
  // Fallback
  // ========================================================================

  describe('translateConstraint', () => {
    it('translates a valid item without a warning', () => {
      const outcome = translateConstraint({ id: 'e1', polish: '(= (mod t 3) 0)' })
      expect(outcome.id).toBe('e1')
      expect(outcome.constraint).toEqual(mod(3, 0))
      expect(outcome.infix).toBe('time % 3 == 0')
      expect(outcome.warning).toBeUndefined()
    })

    it('falls back to always with a warning for unparseable text', () => {
      const outcome = translateConstraint({ id: 'edge-7', polish: '(xor (>= t 1) (< t 2))' })
      expect(outcome.constraint).toEqual(always())
      expect(outcome.infix).toBe('')
      expect(outcome.warning?.id).toBe('edge-7')
      expect(outcome.warning?.input).toBe('(xor (>= t 1) (< t 2))')
    })
  })

  describe('translateBatch', () => {
    it('keeps going after a bad item and counts failures', () => {
      const batch = translateBatch([
        { id: 'a', polish: '(< t 4)' },
        { id: 'b', polish: '(xor (>= t 1) (< t 2))' },
        { id: 'c', polish: '' },
        { id: 'd', polish: '(= t' },
      ])
      expect(batch.outcomes.map((o) => o.infix)).toEqual(['time < 4', '', '', ''])
      expect(batch.failureCount).toBe(2)
      expect(batch.warnings.map((w) => w.id)).toEqual(['b', 'd'])
    })

    it('keeps going after an item nested too deeply to read', () => {
      const deep = '(not '.repeat(20000) + '(= t 1)' + ')'.repeat(20000)
      const batch = translateBatch([
        { id: 'ok', polish: '(>= t 2)' },
        { id: 'deep', polish: deep },
      ])
      expect(batch.outcomes.map((o) => o.infix)).toEqual(['time >= 2', ''])
      expect(batch.failureCount).toBe(1)
      expect(batch.warnings.map((w) => w.id)).toEqual(['deep'])
    })

    it('an empty batch has no outcomes and no failures', () => {
      expect(translateBatch([])).toEqual({ outcomes: [], warnings: [], failureCount: 0 })
    })
  })
})
