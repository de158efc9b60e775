/**
 * Infix Syntax
 *
 * Printer for the C-like constraint expressions read by the `.dot` solver.
 * There is no infix parser: infix text is only ever produced here and
 * handed to the solver as an opaque string.
 */

import type { Constraint } from './constraint-ast'

const TIME_VARIABLE = 'time'

export function toInfix(constraint: Constraint): string {
  switch (constraint.type) {
    case 'always': return ''
    case 'eq': return `${TIME_VARIABLE} == ${constraint.time}`
    case 'greaterEq': return `${TIME_VARIABLE} >= ${constraint.time}`
    case 'lessThan': return `${TIME_VARIABLE} < ${constraint.time}`
    case 'lessEq': return `${TIME_VARIABLE} <= ${constraint.time}`
    case 'mod': return `${TIME_VARIABLE} % ${constraint.modulus} == ${constraint.remainder}`
    case 'explicitSet':
      return constraint.times.map((t) => `${TIME_VARIABLE} == ${t}`).join(' || ')
    case 'not': return `!(${toInfix(constraint.inner)})`
    case 'and': return `(${toInfix(constraint.left)}) && (${toInfix(constraint.right)})`
    case 'or': return `(${toInfix(constraint.left)}) || (${toInfix(constraint.right)})`
  }
}
