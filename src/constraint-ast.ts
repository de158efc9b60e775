/**
 * Constraint AST
 *
 * The language-neutral form of an edge availability predicate over the
 * discrete time variable. Both concrete syntaxes (Polish and infix) are
 * printed from, and the Polish syntax parsed into, this one type.
 */

// ============================================================================
// Types
// ============================================================================

export type Constraint =
  | { readonly type: 'always' }
  | { readonly type: 'eq'; readonly time: number }
  | { readonly type: 'greaterEq'; readonly time: number }
  | { readonly type: 'lessThan'; readonly time: number }
  | { readonly type: 'lessEq'; readonly time: number }
  | { readonly type: 'mod'; readonly modulus: number; readonly remainder: number }
  | { readonly type: 'explicitSet'; readonly times: readonly number[] }
  | { readonly type: 'not'; readonly inner: Constraint }
  | { readonly type: 'and'; readonly left: Constraint; readonly right: Constraint }
  | { readonly type: 'or'; readonly left: Constraint; readonly right: Constraint }

export type ConstraintType = Constraint['type']

/** Comparison atoms: `time <op> N`. */
export type ComparisonType = 'eq' | 'greaterEq' | 'lessThan' | 'lessEq'

// ============================================================================
// Errors
// ============================================================================

export { InvalidConstraintError } from './errors'
import { InvalidConstraintError } from './errors'

// ============================================================================
// Constructors
// ============================================================================

function frozen(constraint: Constraint): Constraint {
  return Object.freeze(constraint)
}

const ALWAYS = frozen({ type: 'always' })

function requireTime(kind: string, time: number): void {
  if (!Number.isSafeInteger(time) || time < 0) {
    throw new InvalidConstraintError(`${kind} requires a non-negative integer time, got ${time}`)
  }
}

export function always(): Constraint {
  return ALWAYS
}

export function eq(time: number): Constraint {
  requireTime('eq', time)
  return frozen({ type: 'eq', time })
}

export function greaterEq(time: number): Constraint {
  requireTime('greaterEq', time)
  return frozen({ type: 'greaterEq', time })
}

export function lessThan(time: number): Constraint {
  requireTime('lessThan', time)
  return frozen({ type: 'lessThan', time })
}

export function lessEq(time: number): Constraint {
  requireTime('lessEq', time)
  return frozen({ type: 'lessEq', time })
}

export function comparison(type: ComparisonType, time: number): Constraint {
  switch (type) {
    case 'eq': return eq(time)
    case 'greaterEq': return greaterEq(time)
    case 'lessThan': return lessThan(time)
    case 'lessEq': return lessEq(time)
  }
}

export function mod(modulus: number, remainder: number): Constraint {
  if (!Number.isSafeInteger(modulus) || modulus <= 0) {
    throw new InvalidConstraintError(`mod requires a positive integer modulus, got ${modulus}`)
  }
  if (!Number.isSafeInteger(remainder) || remainder < 0 || remainder >= modulus) {
    throw new InvalidConstraintError(`mod remainder must be in [0, ${modulus}), got ${remainder}`)
  }
  return frozen({ type: 'mod', modulus, remainder })
}

/**
 * Explicit time set. Input order and duplicates are irrelevant; the stored
 * sequence is the canonical ascending, duplicate-free form.
 */
export function explicitSet(times: readonly number[]): Constraint {
  if (times.length === 0) throw new InvalidConstraintError('explicitSet requires at least one time')
  for (const t of times) requireTime('explicitSet', t)
  const canonical = [...new Set(times)].sort((a, b) => a - b)
  return frozen({ type: 'explicitSet', times: Object.freeze(canonical) })
}

/**
 * `always` has no printed form inside a compound, so the compound
 * constructors fold it away: `not(always)` becomes the never-true
 * `(< t 0)`, `and` drops it, `or` collapses to it.
 */
export function not(inner: Constraint): Constraint {
  if (inner.type === 'always') return lessThan(0)
  return frozen({ type: 'not', inner })
}

export function and(left: Constraint, right: Constraint): Constraint {
  if (left.type === 'always') return right
  if (right.type === 'always') return left
  return frozen({ type: 'and', left, right })
}

export function or(left: Constraint, right: Constraint): Constraint {
  if (left.type === 'always' || right.type === 'always') return ALWAYS
  return frozen({ type: 'or', left, right })
}

/**
 * Fold a list into a right-nested conjunction. An empty list is `always`;
 * `always` members drop out.
 */
export function allOf(constraints: readonly Constraint[]): Constraint {
  if (constraints.length === 0) return ALWAYS
  return foldRight(constraints, and)
}

/**
 * Fold a list into a right-nested disjunction; any `always` member makes
 * the whole fold `always`.
 */
export function anyOf(constraints: readonly Constraint[]): Constraint {
  if (constraints.length === 0) throw new InvalidConstraintError('anyOf requires at least one constraint')
  return foldRight(constraints, or)
}

function foldRight(
  constraints: readonly Constraint[],
  combine: (left: Constraint, right: Constraint) => Constraint
): Constraint {
  let acc = constraints[constraints.length - 1]
  for (let i = constraints.length - 2; i >= 0; i--) {
    acc = combine(constraints[i], acc)
  }
  return acc
}

// ============================================================================
// Queries
// ============================================================================

export function isAlways(constraint: Constraint): boolean {
  return constraint.type === 'always'
}

export function isCompound(constraint: Constraint): boolean {
  return constraint.type === 'not' || constraint.type === 'and' || constraint.type === 'or'
}

/** Depth of the tree; atoms and `always` have depth 1. */
export function constraintDepth(constraint: Constraint): number {
  switch (constraint.type) {
    case 'not':
      return 1 + constraintDepth(constraint.inner)
    case 'and':
    case 'or':
      return 1 + Math.max(constraintDepth(constraint.left), constraintDepth(constraint.right))
    default:
      return 1
  }
}

export function constraintEquals(a: Constraint, b: Constraint): boolean {
  switch (a.type) {
    case 'always':
      return b.type === 'always'
    case 'eq':
      return b.type === 'eq' && b.time === a.time
    case 'greaterEq':
      return b.type === 'greaterEq' && b.time === a.time
    case 'lessThan':
      return b.type === 'lessThan' && b.time === a.time
    case 'lessEq':
      return b.type === 'lessEq' && b.time === a.time
    case 'mod':
      return b.type === 'mod' && b.modulus === a.modulus && b.remainder === a.remainder
    case 'explicitSet':
      return b.type === 'explicitSet'
        && b.times.length === a.times.length
        && a.times.every((t, i) => b.times[i] === t)
    case 'not':
      return b.type === 'not' && constraintEquals(a.inner, b.inner)
    case 'and':
      return b.type === 'and' && constraintEquals(a.left, b.left) && constraintEquals(a.right, b.right)
    case 'or':
      return b.type === 'or' && constraintEquals(a.left, b.left) && constraintEquals(a.right, b.right)
  }
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Whether an edge carrying `constraint` may be traversed at `time`.
 */
export function evaluateConstraint(constraint: Constraint, time: number): boolean {
  switch (constraint.type) {
    case 'always': return true
    case 'eq': return time === constraint.time
    case 'greaterEq': return time >= constraint.time
    case 'lessThan': return time < constraint.time
    case 'lessEq': return time <= constraint.time
    case 'mod': return ((time % constraint.modulus) + constraint.modulus) % constraint.modulus === constraint.remainder
    case 'explicitSet': return constraint.times.includes(time)
    case 'not': return !evaluateConstraint(constraint.inner, time)
    case 'and': return evaluateConstraint(constraint.left, time) && evaluateConstraint(constraint.right, time)
    case 'or': return evaluateConstraint(constraint.left, time) || evaluateConstraint(constraint.right, time)
  }
}

/**
 * Time steps in [0, horizon) at which the constraint holds.
 */
export function availableTimes(constraint: Constraint, horizon: number): number[] {
  const times: number[] = []
  for (let t = 0; t < horizon; t++) {
    if (evaluateConstraint(constraint, t)) times.push(t)
  }
  return times
}
