/**
 * Polish Syntax
 *
 * Parser and printer for the fully parenthesized prefix syntax read by the
 * `.tg` solver:
 *
 *   (= t N) (>= t N) (< t N) (<= t N) (= (mod t M) R)
 *   (not F) (and F G) (or F G) (n1,n2,...)
 *
 * Empty text is `always`. Redundant enclosing parentheses around any
 * formula are accepted at any depth.
 *
 * Parsing is two passes over local state only: text to s-expression, then
 * s-expression to Constraint.
 */

import {
  type Constraint,
  always,
  comparison,
  mod,
  explicitSet,
  not,
  and,
  or,
} from './constraint-ast'
import { MalformedConstraintError, InvalidConstraintError } from './errors'
import { type Result, Ok, Err } from './result'

export { MalformedConstraintError } from './errors'

// ============================================================================
// S-expressions
// ============================================================================

type SExpr = string | SExpr[]

const INT_PATTERN = /^\d+$/

/** Deepest parenthesis nesting accepted before the text is rejected. */
export const MAX_NESTING_DEPTH = 256

function tokenize(text: string): string[] {
  const tokens: string[] = []
  let current = ''
  for (const ch of text) {
    if (ch === '(' || ch === ')' || ch === ',') {
      if (current) tokens.push(current)
      current = ''
      tokens.push(ch)
    } else if (/\s/.test(ch)) {
      if (current) tokens.push(current)
      current = ''
    } else {
      current += ch
    }
  }
  if (current) tokens.push(current)
  return tokens
}

function readSExpr(tokens: string[], input: string): SExpr {
  const stack: SExpr[][] = []
  let root: SExpr | undefined

  for (const token of tokens) {
    if (root !== undefined) {
      throw new MalformedConstraintError(input, `Unexpected '${token}' after end of formula in '${input}'`)
    }
    if (token === '(') {
      if (stack.length >= MAX_NESTING_DEPTH) {
        throw new MalformedConstraintError(input, `Nesting deeper than ${MAX_NESTING_DEPTH} levels in '${input}'`)
      }
      stack.push([])
    } else if (token === ')') {
      const list = stack.pop()
      if (list === undefined) {
        throw new MalformedConstraintError(input, `Unbalanced ')' in '${input}'`)
      }
      const parent = stack[stack.length - 1]
      if (parent === undefined) root = list
      else parent.push(list)
    } else {
      const parent = stack[stack.length - 1]
      if (parent === undefined) {
        throw new MalformedConstraintError(input, `Expected '(' but found '${token}' in '${input}'`)
      }
      parent.push(token)
    }
  }

  if (stack.length > 0 || root === undefined) {
    throw new MalformedConstraintError(input, `Unbalanced '(' in '${input}'`)
  }
  return root
}

// ============================================================================
// Classification
// ============================================================================

const COMPARISONS = {
  '=': 'eq',
  '>=': 'greaterEq',
  '<': 'lessThan',
  '<=': 'lessEq',
} as const

function isComparisonHead(head: string): head is keyof typeof COMPARISONS {
  return Object.prototype.hasOwnProperty.call(COMPARISONS, head)
}

function readInt(expr: SExpr | undefined, input: string): number {
  if (typeof expr !== 'string' || !INT_PATTERN.test(expr)) {
    throw new MalformedConstraintError(input, `Expected an integer in '${input}'`)
  }
  const value = Number(expr)
  if (!Number.isSafeInteger(value)) {
    throw new MalformedConstraintError(input, `Integer ${expr} out of range in '${input}'`)
  }
  return value
}

/** Peel `((x))` down to `(x)`. */
function unwrap(expr: SExpr): SExpr {
  let current = expr
  while (Array.isArray(current) && current.length === 1 && Array.isArray(current[0])) {
    current = current[0]
  }
  return current
}

function isExplicitSet(list: SExpr[]): boolean {
  if (list.length % 2 === 0) return false
  return list.every((item, i) =>
    typeof item === 'string' && (i % 2 === 0 ? INT_PATTERN.test(item) : item === ',')
  )
}

function readModTerm(expr: SExpr | undefined, input: string): number {
  const term = expr === undefined ? undefined : unwrap(expr)
  if (!Array.isArray(term) || term.length !== 3 || term[0] !== 'mod' || term[1] !== 't') {
    throw new MalformedConstraintError(input, `Expected '(mod t M)' in '${input}'`)
  }
  return readInt(term[2], input)
}

function classify(expr: SExpr, input: string): Constraint {
  const list = unwrap(expr)
  if (!Array.isArray(list)) {
    throw new MalformedConstraintError(input, `Expected a parenthesized formula but found '${list}' in '${input}'`)
  }

  if (isExplicitSet(list)) {
    const times = list.filter((_, i) => i % 2 === 0).map((item) => readInt(item, input))
    return explicitSet(times)
  }

  const [head, ...args] = list
  if (typeof head !== 'string') {
    throw new MalformedConstraintError(input, `Unrecognized formula in '${input}'`)
  }

  if (isComparisonHead(head) && args.length === 2) {
    const [lhs, rhs] = args
    if (lhs === 't') return comparison(COMPARISONS[head], readInt(rhs, input))
    if (head === '=' && lhs !== undefined) {
      const modulus = readModTerm(lhs, input)
      const remainder = readInt(rhs, input)
      try {
        return mod(modulus, remainder)
      } catch (e) {
        if (e instanceof InvalidConstraintError) {
          throw new MalformedConstraintError(input, `${e.message} in '${input}'`)
        }
        throw e
      }
    }
  }

  if (head === 'not' && args.length === 1) {
    const [inner] = args
    if (inner !== undefined) return not(classify(inner, input))
  }

  if ((head === 'and' || head === 'or') && args.length === 2) {
    const [left, right] = args
    if (left !== undefined && right !== undefined) {
      const combine = head === 'and' ? and : or
      return combine(classify(left, input), classify(right, input))
    }
  }

  throw new MalformedConstraintError(input, `Unrecognized formula '${head}' in '${input}'`)
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse Polish text into a Constraint.
 *
 * @throws MalformedConstraintError when the text matches no production
 */
export function parsePolish(text: string): Constraint {
  const trimmed = text.trim()
  if (trimmed === '') return always()
  return classify(readSExpr(tokenize(trimmed), text), text)
}

export function tryParsePolish(text: string): Result<Constraint, MalformedConstraintError> {
  try {
    return Ok(parsePolish(text))
  } catch (e) {
    if (e instanceof MalformedConstraintError) return Err(e)
    throw e
  }
}

// ============================================================================
// Printing
// ============================================================================

export function toPolish(constraint: Constraint): string {
  switch (constraint.type) {
    case 'always': return ''
    case 'eq': return `(= t ${constraint.time})`
    case 'greaterEq': return `(>= t ${constraint.time})`
    case 'lessThan': return `(< t ${constraint.time})`
    case 'lessEq': return `(<= t ${constraint.time})`
    case 'mod': return `(= (mod t ${constraint.modulus}) ${constraint.remainder})`
    case 'explicitSet': return `(${constraint.times.join(',')})`
    case 'not': return `(not ${toPolish(constraint.inner)})`
    case 'and': return `(and ${toPolish(constraint.left)} ${toPolish(constraint.right)})`
    case 'or': return `(or ${toPolish(constraint.left)} ${toPolish(constraint.right)})`
  }
}
