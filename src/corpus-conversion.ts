/**
 * Corpus Conversion
 *
 * Turns `.tg` files into `.dot` files one item at a time. An item fails when
 * a line cannot be read or the game it describes is not valid; constraints
 * that do not parse only produce warnings and convert as `always`.
 */

import { readTg } from './tg-codec'
import { dotGraphName, writeDot } from './dot-codec'
import { targetIds } from './game-model'
import { applyLabelTargetRule } from './game-synthesis'
import { validateGame, type GameViolation } from './game-validator'
import type { MalformedGameLineError } from './errors'
import type { ConversionWarning } from './translator'
import { Err, Ok, type Result } from './result'
import { log } from './logger'

// ============================================================================
// Types
// ============================================================================

export type CorpusItem = {
  /** File name or other identifier, e.g. `game_0001_chain_5`. */
  id: string
  text: string
  /** Graph name; defaults to the id with non-word characters replaced by `_`. */
  name?: string
}

export type ConvertedGame = {
  id: string
  dot: string
  targets: string[]
  warnings: ConversionWarning[]
}

export type ConversionFailure = {
  id: string
  message: string
  lineErrors: MalformedGameLineError[]
  violations: GameViolation[]
}

export type CorpusOutcome = Result<ConvertedGame, ConversionFailure>

export type CorpusConversion = {
  outcomes: CorpusOutcome[]
  failureCount: number
}

// ============================================================================
// Conversion
// ============================================================================

export function convertTgToDot(item: CorpusItem): CorpusOutcome {
  const name = dotGraphName(item.name ?? item.id)
  const { game, errors, warnings } = readTg(item.text, name)
  const violations = validateGame(game)

  if (errors.length > 0 || violations.length > 0) {
    const message = `Cannot convert ${item.id}: ${errors.length} malformed line(s), ${violations.length} violation(s)`
    log.warn({ event: 'corpus.failure', id: item.id, lineErrors: errors.length, violations: violations.length }, message)
    return Err({ id: item.id, message, lineErrors: errors, violations })
  }

  // `// targets:` header wins; otherwise the last node and target-like labels.
  const targeted = targetIds(game).length > 0 ? game : applyLabelTargetRule(game)

  return Ok({
    id: item.id,
    dot: writeDot(targeted, { graphName: name }),
    targets: targetIds(targeted),
    warnings: warnings.map((w) => ({ ...w, id: `${item.id}:${w.id}` })),
  })
}

export function convertCorpus(items: readonly CorpusItem[]): CorpusConversion {
  const outcomes = items.map(convertTgToDot)
  const failureCount = outcomes.filter((o) => !o.ok).length
  log.info({ event: 'corpus.batch', total: items.length, failures: failureCount }, 'Converted game corpus')
  return { outcomes, failureCount }
}

/** One comma-separated target line per converted game, in corpus order. */
export function formatTargetLines(conversion: CorpusConversion): string {
  return conversion.outcomes
    .flatMap((o) => (o.ok ? [o.value.targets.join(',')] : []))
    .map((line) => line + '\n')
    .join('')
}
