/**
 * Game Validator
 *
 * Structural checks on a GameModel. Every check runs and every violation is
 * reported; a game is valid when the list is empty.
 */

import type { GameModel } from './game-model'
import { TemporalGameErrorCode } from './errors'
import type { MalformedGameLineError } from './errors'
import { readTg } from './tg-codec'

// ============================================================================
// Types
// ============================================================================

export type GameViolation =
  | { kind: typeof TemporalGameErrorCode.INVALID_OWNER; nodeId: string; owner: number; message: string }
  | {
      kind: typeof TemporalGameErrorCode.DANGLING_EDGE_REFERENCE
      edgeIndex: number
      endpoint: 'source' | 'target'
      nodeId: string
      message: string
    }
  | { kind: typeof TemporalGameErrorCode.EMPTY_GAME; missing: 'nodes' | 'edges'; message: string }

export type GameViolationKind = GameViolation['kind']

export type TgValidationReport = {
  valid: boolean
  violations: GameViolation[]
  lineErrors: MalformedGameLineError[]
}

// ============================================================================
// Validation
// ============================================================================

export function validateGame(game: GameModel): GameViolation[] {
  const violations: GameViolation[] = []

  for (const node of game.nodes.values()) {
    if (node.owner !== 0 && node.owner !== 1) {
      violations.push({
        kind: TemporalGameErrorCode.INVALID_OWNER,
        nodeId: node.id,
        owner: node.owner,
        message: `Node ${node.id} has owner ${node.owner}; expected 0 or 1`,
      })
    }
  }

  game.edges.forEach((edge, edgeIndex) => {
    for (const endpoint of ['source', 'target'] as const) {
      const nodeId = edge[endpoint]
      if (!game.nodes.has(nodeId)) {
        violations.push({
          kind: TemporalGameErrorCode.DANGLING_EDGE_REFERENCE,
          edgeIndex,
          endpoint,
          nodeId,
          message: `Edge ${edge.source} -> ${edge.target} references undefined ${endpoint} node ${nodeId}`,
        })
      }
    }
  })

  if (game.nodes.size === 0) {
    violations.push({ kind: TemporalGameErrorCode.EMPTY_GAME, missing: 'nodes', message: 'No nodes defined' })
  }
  if (game.edges.length === 0) {
    violations.push({ kind: TemporalGameErrorCode.EMPTY_GAME, missing: 'edges', message: 'No edges defined' })
  }

  return violations
}

export function isValidGame(game: GameModel): boolean {
  return validateGame(game).length === 0
}

/**
 * Read `.tg` text and validate the result. Unreadable lines make the file
 * invalid as well.
 */
export function validateTgText(text: string, name?: string): TgValidationReport {
  const { game, errors } = readTg(text, name)
  const violations = validateGame(game)
  return { valid: violations.length === 0 && errors.length === 0, violations, lineErrors: errors }
}
