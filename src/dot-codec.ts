/**
 * `.dot` Codec
 *
 * Writes the game files of the infix-format solver:
 *
 *   digraph <name> {
 *       <id> [name="<id>", player=0|1[, target=1]];
 *
 *       <src> -> <dst>[ [constraint="<infix>"]];
 *   }
 *
 * The reader returns the declarations as found, with edge constraints kept
 * as raw infix strings; infix text is never parsed back into a Constraint.
 */

import { toInfix } from './infix'
import type { GameModel } from './game-model'
import { MalformedGameLineError } from './errors'
import { log } from './logger'

// ============================================================================
// Types
// ============================================================================

export type DotNode = {
  id: string
  name: string
  player: number
  isTarget: boolean
}

export type DotEdge = {
  source: string
  target: string
  /** Raw infix text; empty when the edge has no constraint. */
  constraint: string
}

export type DotReadResult = {
  name: string
  nodes: DotNode[]
  edges: DotEdge[]
  errors: MalformedGameLineError[]
}

export interface DotWriteOptions {
  /** Defaults to the game name with characters outside [A-Za-z0-9_] replaced by `_`. */
  graphName?: string
}

// ============================================================================
// Writing
// ============================================================================

const INDENT = '    '

export function dotGraphName(name: string): string {
  const cleaned = name.replace(/\W/g, '_')
  return cleaned === '' ? 'G' : cleaned
}

export function writeDot(game: GameModel, options: DotWriteOptions = {}): string {
  const lines = [`digraph ${options.graphName ?? dotGraphName(game.name)} {`]

  for (const node of game.nodes.values()) {
    const attrs = [`name="${node.id}"`, `player=${node.owner}`]
    if (node.isTarget) attrs.push('target=1')
    lines.push(`${INDENT}${node.id} [${attrs.join(', ')}];`)
  }
  lines.push('')
  for (const edge of game.edges) {
    const constraint = toInfix(edge.constraint)
    lines.push(constraint
      ? `${INDENT}${edge.source} -> ${edge.target} [constraint="${constraint}"];`
      : `${INDENT}${edge.source} -> ${edge.target};`)
  }
  lines.push('}')
  return lines.join('\n') + '\n'
}

// ============================================================================
// Reading
// ============================================================================

const HEADER_LINE = /^digraph\s+(\w+)\s*\{$/
const NODE_LINE = /^(\w+)\s*\[([^\]]*)\]\s*;?$/
const EDGE_LINE = /^(\w+)\s*->\s*(\w+)\s*(?:\[\s*constraint\s*=\s*"([^"]*)"\s*\])?\s*;?$/
const ATTRIBUTE = /(\w+)\s*=\s*(?:"([^"]*)"|([^,\s]+))/g

function readAttributes(text: string): Map<string, string> {
  const attrs = new Map<string, string>()
  for (const match of text.matchAll(ATTRIBUTE)) {
    attrs.set(match[1], match[2] ?? match[3] ?? '')
  }
  return attrs
}

export function readDot(text: string): DotReadResult {
  let name = ''
  const nodes: DotNode[] = []
  const edges: DotEdge[] = []
  const errors: MalformedGameLineError[] = []

  const fail = (lineNo: number, raw: string, reason: string): void => {
    const error = new MalformedGameLineError(lineNo, raw, `Line ${lineNo}: ${reason}: ${raw.trim()}`)
    log.debug({ event: 'dot.malformedLine', line: lineNo }, error.message)
    errors.push(error)
  }

  text.split(/\r?\n/).forEach((raw, index) => {
    const lineNo = index + 1
    const line = raw.trim()
    if (line === '' || line === '}' || line.startsWith('//')) return

    const header = HEADER_LINE.exec(line)
    if (header) {
      name = header[1]
      return
    }

    const edge = EDGE_LINE.exec(line)
    if (edge) {
      edges.push({ source: edge[1], target: edge[2], constraint: edge[3] ?? '' })
      return
    }

    const node = NODE_LINE.exec(line)
    if (node) {
      const attrs = readAttributes(node[2])
      const player = attrs.get('player')
      if (player === undefined || !/^\d+$/.test(player)) {
        return fail(lineNo, raw, `node ${node[1]} has no numeric player attribute`)
      }
      nodes.push({
        id: node[1],
        name: attrs.get('name') ?? node[1],
        player: Number(player),
        isTarget: attrs.get('target') === '1',
      })
      return
    }

    fail(lineNo, raw, 'matches neither a node nor an edge declaration')
  })

  return { name, nodes, edges, errors }
}

/** Ids declared with `target=1`, in declaration order. */
export function extractDotTargets(text: string): string[] {
  return readDot(text).nodes.filter((n) => n.isTarget).map((n) => n.id)
}
