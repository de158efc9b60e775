/**
 * Translator
 *
 * Polish -> AST -> infix. Single conversions throw on malformed input;
 * item and batch conversions never do: an item that does not parse becomes
 * `always` (empty infix) and carries a warning under its identifier.
 * `always` is the fallback because it cannot take a move away from either
 * player and is valid in both syntaxes.
 */

import { type Constraint, always } from './constraint-ast'
import { parsePolish, tryParsePolish } from './polish'
import { toInfix } from './infix'
import { log } from './logger'

// ============================================================================
// Types
// ============================================================================

export type ConversionWarning = {
  /** Identifier of the item that failed, e.g. an edge or file name. */
  id: string
  input: string
  message: string
}

export type TranslationItem = {
  id: string
  polish: string
}

export type TranslationOutcome = {
  id: string
  constraint: Constraint
  infix: string
  warning?: ConversionWarning
}

export type BatchTranslation = {
  outcomes: TranslationOutcome[]
  warnings: ConversionWarning[]
  failureCount: number
}

// ============================================================================
// Translation
// ============================================================================

/**
 * @throws MalformedConstraintError when `text` is not valid Polish
 */
export function polishToInfix(text: string): string {
  return toInfix(parsePolish(text))
}

export function translateConstraint(item: TranslationItem): TranslationOutcome {
  const parsed = tryParsePolish(item.polish)
  if (parsed.ok) {
    return { id: item.id, constraint: parsed.value, infix: toInfix(parsed.value) }
  }
  const warning: ConversionWarning = { id: item.id, input: item.polish, message: parsed.error.message }
  log.warn({ event: 'constraint.fallback', ...warning }, 'Unparseable constraint replaced by always')
  return { id: item.id, constraint: always(), infix: '', warning }
}

/**
 * Translate items independently; one bad item never affects another.
 */
export function translateBatch(items: readonly TranslationItem[]): BatchTranslation {
  const outcomes = items.map(translateConstraint)
  const warnings = outcomes.flatMap((o) => (o.warning ? [o.warning] : []))
  log.info({ event: 'constraint.batch', total: items.length, failures: warnings.length }, 'Translated constraint batch')
  return { outcomes, warnings, failureCount: warnings.length }
}
