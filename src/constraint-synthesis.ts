/**
 * Constraint Synthesis
 *
 * Draws random Constraint values from a weighted shape distribution. The
 * AST is built directly, so every synthesized constraint prints to Polish
 * and infix text that denotes exactly that value.
 */

import {
  type Constraint,
  always,
  eq,
  greaterEq,
  lessEq,
  lessThan,
  mod,
  explicitSet,
  not,
  and,
  or,
} from './constraint-ast'
import type { RandomSource } from './random'
import { InvalidConfigError } from './errors'

// ============================================================================
// Types
// ============================================================================

export const CONSTRAINT_SHAPES = [
  'none',
  'equality',
  'modulo',
  'greaterEqual',
  'lessEqual',
  'lessThan',
  'explicitSet',
  'conjunction',
  'disjunction',
  'negation',
] as const

export type ConstraintShape = (typeof CONSTRAINT_SHAPES)[number]

export type AtomicShape = Exclude<ConstraintShape, 'none' | CompoundShape>
export type CompoundShape = 'conjunction' | 'disjunction' | 'negation'

export type ConstraintWeights = Record<ConstraintShape, number>

export type IntRange = { min: number; max: number }

export interface ConstraintRanges {
  /** Time for `(= t N)`. */
  equalityTime: IntRange
  /** Time for `(>= t N)`. */
  greaterEqualTime: IntRange
  /** Time for `(<= t N)` and `(< t N)`. */
  upperBoundTime: IntRange
  modulus: IntRange
  explicitSetSize: IntRange
  /** Explicit set members are drawn from [0, explicitSetUniverse). */
  explicitSetUniverse: number
}

export interface ConstraintSynthesisOptions {
  /** Shapes missing from the record are never drawn. */
  weights?: Partial<ConstraintWeights>
  ranges?: Partial<ConstraintRanges>
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONSTRAINT_WEIGHTS: Readonly<ConstraintWeights> = Object.freeze({
  none: 0.3,
  equality: 0.2,
  modulo: 0.2,
  greaterEqual: 0.15,
  lessEqual: 0.05,
  lessThan: 0.05,
  explicitSet: 0,
  conjunction: 0.025,
  disjunction: 0.025,
  negation: 0,
})

export const DEFAULT_CONSTRAINT_RANGES: Readonly<ConstraintRanges> = Object.freeze({
  equalityTime: { min: 0, max: 20 },
  greaterEqualTime: { min: 1, max: 15 },
  upperBoundTime: { min: 5, max: 25 },
  modulus: { min: 2, max: 8 },
  explicitSetSize: { min: 1, max: 6 },
  explicitSetUniverse: 30,
})

const ATOMIC_SHAPES: readonly AtomicShape[] = [
  'equality', 'modulo', 'greaterEqual', 'lessEqual', 'lessThan', 'explicitSet',
]

export function isCompoundShape(shape: ConstraintShape): shape is CompoundShape {
  return shape === 'conjunction' || shape === 'disjunction' || shape === 'negation'
}

// ============================================================================
// Option Resolution
// ============================================================================

type ResolvedOptions = {
  weights: ConstraintWeights
  ranges: ConstraintRanges
}

function checkRange(name: string, range: IntRange, floor: number): void {
  if (!Number.isSafeInteger(range.min) || !Number.isSafeInteger(range.max) || range.min > range.max) {
    throw new InvalidConfigError(`${name} must be an integer range with min <= max, got [${range.min}, ${range.max}]`)
  }
  if (range.min < floor) {
    throw new InvalidConfigError(`${name} must start at ${floor} or above, got ${range.min}`)
  }
}

function resolveOptions(options: ConstraintSynthesisOptions = {}): ResolvedOptions {
  const weights: ConstraintWeights = options.weights
    ? {
        none: options.weights.none ?? 0,
        equality: options.weights.equality ?? 0,
        modulo: options.weights.modulo ?? 0,
        greaterEqual: options.weights.greaterEqual ?? 0,
        lessEqual: options.weights.lessEqual ?? 0,
        lessThan: options.weights.lessThan ?? 0,
        explicitSet: options.weights.explicitSet ?? 0,
        conjunction: options.weights.conjunction ?? 0,
        disjunction: options.weights.disjunction ?? 0,
        negation: options.weights.negation ?? 0,
      }
    : { ...DEFAULT_CONSTRAINT_WEIGHTS }
  const ranges: ConstraintRanges = { ...DEFAULT_CONSTRAINT_RANGES, ...options.ranges }

  checkRange('equalityTime', ranges.equalityTime, 0)
  checkRange('greaterEqualTime', ranges.greaterEqualTime, 0)
  checkRange('upperBoundTime', ranges.upperBoundTime, 0)
  checkRange('modulus', ranges.modulus, 1)
  checkRange('explicitSetSize', ranges.explicitSetSize, 1)
  if (ranges.explicitSetSize.max > ranges.explicitSetUniverse) {
    throw new InvalidConfigError(
      `explicitSetSize.max (${ranges.explicitSetSize.max}) exceeds explicitSetUniverse (${ranges.explicitSetUniverse})`
    )
  }
  return { weights, ranges }
}

// ============================================================================
// Synthesis
// ============================================================================

function drawInRange(random: RandomSource, range: IntRange): number {
  return random.int(range.min, range.max)
}

function synthesizeAtom(random: RandomSource, shape: AtomicShape, ranges: ConstraintRanges): Constraint {
  switch (shape) {
    case 'equality':
      return eq(drawInRange(random, ranges.equalityTime))
    case 'modulo': {
      const modulus = drawInRange(random, ranges.modulus)
      return mod(modulus, random.int(0, modulus - 1))
    }
    case 'greaterEqual':
      return greaterEq(drawInRange(random, ranges.greaterEqualTime))
    case 'lessEqual':
      return lessEq(drawInRange(random, ranges.upperBoundTime))
    case 'lessThan':
      return lessThan(drawInRange(random, ranges.upperBoundTime))
    case 'explicitSet': {
      const size = drawInRange(random, ranges.explicitSetSize)
      const universe = Array.from({ length: ranges.explicitSetUniverse }, (_, i) => i)
      return explicitSet(random.sample(universe, size))
    }
  }
}

/** Operand shape for a compound: the configured atomic weights, or uniform when they are all zero. */
function drawOperandShape(random: RandomSource, weights: ConstraintWeights): AtomicShape {
  const atomic = {
    equality: weights.equality,
    modulo: weights.modulo,
    greaterEqual: weights.greaterEqual,
    lessEqual: weights.lessEqual,
    lessThan: weights.lessThan,
    explicitSet: weights.explicitSet,
  }
  const total = ATOMIC_SHAPES.reduce((sum, shape) => sum + Math.max(0, atomic[shape]), 0)
  return total > 0 ? random.weighted(atomic) : random.pick(ATOMIC_SHAPES)
}

function synthesizeShape(random: RandomSource, shape: ConstraintShape, options: ResolvedOptions): Constraint {
  const operand = (): Constraint => synthesizeAtom(random, drawOperandShape(random, options.weights), options.ranges)
  switch (shape) {
    case 'none':
      return always()
    case 'conjunction': {
      const left = operand()
      return and(left, operand())
    }
    case 'disjunction': {
      const left = operand()
      return or(left, operand())
    }
    case 'negation':
      return not(operand())
    default:
      return synthesizeAtom(random, shape, options.ranges)
  }
}

/**
 * Draw one constraint. Compound shapes combine atomic operands only, so the
 * result has depth at most 2.
 */
export function synthesizeConstraint(random: RandomSource, options?: ConstraintSynthesisOptions): Constraint {
  const resolved = resolveOptions(options)
  return synthesizeShape(random, random.weighted(resolved.weights), resolved)
}

export function synthesizeConstraintOfShape(
  random: RandomSource,
  shape: ConstraintShape,
  options?: ConstraintSynthesisOptions
): Constraint {
  return synthesizeShape(random, shape, resolveOptions(options))
}
