/**
 * `.tg` Codec
 *
 * Reads and writes the game files of the Polish-format solver:
 *
 *   // time_bound: 12          (optional header)
 *   // targets: v3,v7          (optional header)
 *   node <id>: label["<text>"], owner[0|1]
 *   edge <src> -> <dst>[: <polish-constraint>]
 *
 * Reading classifies each line as blank, comment, node, edge, or malformed.
 * Malformed lines are collected and skipped; edges whose constraint does
 * not parse keep `always` and produce a conversion warning.
 */

import { always } from './constraint-ast'
import { toPolish, tryParsePolish } from './polish'
import { GameBuilder, type GameModel, targetIds } from './game-model'
import { MalformedGameLineError } from './errors'
import type { ConversionWarning } from './translator'
import { log } from './logger'

export { MalformedGameLineError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type TgReadResult = {
  game: GameModel
  errors: MalformedGameLineError[]
  warnings: ConversionWarning[]
}

type TgLine =
  | { kind: 'blank' }
  | { kind: 'comment'; text: string }
  | { kind: 'node'; id: string; label: string | undefined; owner: number | undefined }
  | { kind: 'edge'; source: string; target: string; constraint: string }
  | { kind: 'malformed'; reason: string }

// ============================================================================
// Line Classification
// ============================================================================

const NODE_LINE = /^node\s+(\w+)\s*:\s*(.*)$/
const EDGE_LINE = /^edge\s+(\w+)\s*->\s*(\w+)\s*(?::(.*))?$/
const LABEL_ATTR = /label\["([^"]*)"\]/
const OWNER_ATTR = /owner\[(\d+)\]/
const TIME_BOUND_HEADER = /^time_bound:\s*(\d+)\s*$/
const TARGETS_HEADER = /^targets:\s*(.*)$/

function classifyLine(raw: string): TgLine {
  const line = raw.trim()
  if (line === '') return { kind: 'blank' }
  if (line.startsWith('//')) return { kind: 'comment', text: line.slice(2).trim() }

  const node = NODE_LINE.exec(line)
  if (node) {
    const [, id, attrs] = node
    const label = LABEL_ATTR.exec(attrs)
    const owner = OWNER_ATTR.exec(attrs)
    return {
      kind: 'node',
      id,
      label: label ? label[1] : undefined,
      owner: owner ? Number(owner[1]) : undefined,
    }
  }

  const edge = EDGE_LINE.exec(line)
  if (edge) {
    const [, source, target, constraint] = edge
    return { kind: 'edge', source, target, constraint: (constraint ?? '').trim() }
  }

  return { kind: 'malformed', reason: 'matches neither a node nor an edge declaration' }
}

// ============================================================================
// Reading
// ============================================================================

export function readTg(text: string, name = 'game'): TgReadResult {
  const builder = new GameBuilder(name)
  const errors: MalformedGameLineError[] = []
  const warnings: ConversionWarning[] = []
  const headerTargets: string[] = []

  const fail = (lineNo: number, raw: string, reason: string): void => {
    const error = new MalformedGameLineError(lineNo, raw, `Line ${lineNo}: ${reason}: ${raw.trim()}`)
    log.debug({ event: 'tg.malformedLine', game: name, line: lineNo }, error.message)
    errors.push(error)
  }

  text.split(/\r?\n/).forEach((raw, index) => {
    const lineNo = index + 1
    const line = classifyLine(raw)
    switch (line.kind) {
      case 'blank':
        return
      case 'comment': {
        const bound = TIME_BOUND_HEADER.exec(line.text)
        if (bound) builder.setTimeBound(Number(bound[1]))
        const targets = TARGETS_HEADER.exec(line.text)
        if (targets) {
          headerTargets.push(...targets[1].split(',').map((t) => t.trim()).filter((t) => t !== ''))
        }
        return
      }
      case 'node':
        if (line.owner === undefined) return fail(lineNo, raw, `node ${line.id} has no owner[0|1] attribute`)
        if (builder.hasNode(line.id)) return fail(lineNo, raw, `node ${line.id} is declared twice`)
        builder.addNode({ id: line.id, owner: line.owner, label: line.label ?? line.id })
        return
      case 'edge': {
        const parsed = tryParsePolish(line.constraint)
        if (parsed.ok) {
          builder.addEdge(line.source, line.target, parsed.value)
        } else {
          warnings.push({
            id: `${line.source}->${line.target}@${lineNo}`,
            input: line.constraint,
            message: parsed.error.message,
          })
          builder.addEdge(line.source, line.target, always())
        }
        return
      }
      case 'malformed':
        return fail(lineNo, raw, line.reason)
    }
  })

  builder.markTargets(headerTargets)
  for (const warning of warnings) {
    log.warn({ event: 'constraint.fallback', game: name, ...warning }, 'Unparseable constraint replaced by always')
  }
  return { game: builder.build(), errors, warnings }
}

// ============================================================================
// Writing
// ============================================================================

export function writeTg(game: GameModel): string {
  const lines: string[] = []
  if (game.timeBound !== undefined) lines.push(`// time_bound: ${game.timeBound}`)
  const targets = targetIds(game)
  if (targets.length > 0) lines.push(`// targets: ${targets.join(',')}`)

  for (const node of game.nodes.values()) {
    lines.push(`node ${node.id}: label["${node.label}"], owner[${node.owner}]`)
  }
  lines.push('')
  for (const edge of game.edges) {
    const constraint = toPolish(edge.constraint)
    lines.push(constraint ? `edge ${edge.source} -> ${edge.target}: ${constraint}` : `edge ${edge.source} -> ${edge.target}`)
  }
  return lines.join('\n') + '\n'
}
