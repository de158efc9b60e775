/**
 * Segment 3: Infix Printer Tests
 */

import { describe, it, expect } from 'vitest'
import { toInfix } from '../src/infix'
import {
  always,
  eq,
  greaterEq,
  lessThan,
  lessEq,
  mod,
  explicitSet,
  not,
  and,
  or,
  allOf,
} from '../src/constraint-ast'

describe('Segment 3: Infix Printer', () => {
  it('prints always as empty text', () => {
    expect(toInfix(always())).toBe('')
  })

  it('prints comparison atoms against `time`', () => {
    expect(toInfix(eq(4))).toBe('time == 4')
    expect(toInfix(greaterEq(1))).toBe('time >= 1')
    expect(toInfix(lessThan(20))).toBe('time < 20')
    expect(toInfix(lessEq(6))).toBe('time <= 6')
  })

  it('prints modular atoms', () => {
    expect(toInfix(mod(5, 2))).toBe('time % 5 == 2')
  })

  it('prints explicit sets as a disjunction of equalities', () => {
    expect(toInfix(explicitSet([0, 3, 7]))).toBe('time == 0 || time == 3 || time == 7')
    expect(toInfix(explicitSet([9]))).toBe('time == 9')
  })

  it('parenthesizes every compound operand', () => {
    expect(toInfix(not(mod(4, 0)))).toBe('!(time % 4 == 0)')
    expect(toInfix(and(greaterEq(2), lessEq(8)))).toBe('(time >= 2) && (time <= 8)')
    expect(toInfix(or(mod(2, 0), eq(3)))).toBe('(time % 2 == 0) || (time == 3)')
  })

  it('nests compounds', () => {
    expect(toInfix(and(mod(2, 0), not(mod(3, 0))))).toBe('(time % 2 == 0) && (!(time % 3 == 0))')
    expect(toInfix(not(explicitSet([1, 2])))).toBe('!(time == 1 || time == 2)')
  })

  it('never prints an empty operand', () => {
    expect(toInfix(allOf([always(), eq(1)]))).toBe('time == 1')
    expect(toInfix(not(always()))).toBe('time < 0')
    expect(toInfix(and(eq(4), not(always())))).toBe('(time == 4) && (time < 0)')
  })

  it('returns identical text on repeated calls', () => {
    const c = or(and(greaterEq(1), lessThan(9)), explicitSet([11, 13]))
    expect(toInfix(c)).toBe(toInfix(c))
  })
})
