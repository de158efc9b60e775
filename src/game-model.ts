/**
 * Game Model
 *
 * Nodes, edges and the graph that holds them. A GameModel is a plain
 * immutable value; GameBuilder is the mutable staging area used while a
 * game is synthesized or parsed. Endpoint existence is checked by the
 * validator, not here, so half-built or malformed games can be represented.
 */

import { type Constraint, always } from './constraint-ast'
import { DuplicateNodeError, InvalidNodeError } from './errors'

export { DuplicateNodeError, InvalidNodeError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Player = 0 | 1

export type GameNode = {
  readonly id: string
  /** Player choosing the successor: 0 or 1 in a valid game (see validateGame). */
  readonly owner: number
  readonly label: string
  readonly isTarget: boolean
}

export type GameEdge = {
  readonly source: string
  readonly target: string
  readonly constraint: Constraint
}

export type GameModel = {
  readonly name: string
  /** Iterates in declaration order. */
  readonly nodes: ReadonlyMap<string, GameNode>
  /** Declaration order is part of the file contract. */
  readonly edges: readonly GameEdge[]
  /** Time horizon carried by benchmark games. */
  readonly timeBound?: number
}

export type NodeInput = {
  id: string
  owner: number
  label?: string
  isTarget?: boolean
}

// ============================================================================
// Identifiers
// ============================================================================

// Both file formats delimit ids as word tokens and labels with double quotes
const NODE_ID = /^\w+$/
const LABEL_FORBIDDEN = /["\r\n]/

function requireNodeId(id: string, context: string): void {
  if (!NODE_ID.test(id)) {
    throw new InvalidNodeError(`${context} '${id}' must be a non-empty run of [A-Za-z0-9_]`)
  }
}

function requireLabel(id: string, label: string): void {
  if (LABEL_FORBIDDEN.test(label)) {
    throw new InvalidNodeError(`Label of node '${id}' must not contain a double quote or line break`)
  }
}

// ============================================================================
// Builder
// ============================================================================

export class GameBuilder {
  private readonly nodes = new Map<string, GameNode>()
  private readonly edges: GameEdge[] = []
  private timeBound: number | undefined

  constructor(readonly name: string) {}

  /**
   * @throws InvalidNodeError when the id or label cannot be written to a game file
   * @throws DuplicateNodeError when the id is already declared
   */
  addNode(input: NodeInput): this {
    requireNodeId(input.id, 'Node id')
    if (input.label !== undefined) requireLabel(input.id, input.label)
    if (this.nodes.has(input.id)) {
      throw new DuplicateNodeError(`Node '${input.id}' is already declared in game '${this.name}'`)
    }
    this.nodes.set(input.id, Object.freeze({
      id: input.id,
      owner: input.owner,
      label: input.label ?? input.id,
      isTarget: input.isTarget ?? false,
    }))
    return this
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id)
  }

  /**
   * @throws InvalidNodeError when an endpoint is not a valid node id
   */
  addEdge(source: string, target: string, constraint: Constraint = always()): this {
    requireNodeId(source, 'Edge source')
    requireNodeId(target, 'Edge target')
    this.edges.push(Object.freeze({ source, target, constraint }))
    return this
  }

  setTimeBound(timeBound: number | undefined): this {
    this.timeBound = timeBound
    return this
  }

  /** Mark existing nodes as targets. Unknown ids are ignored. */
  markTargets(ids: Iterable<string>): this {
    for (const id of ids) {
      const node = this.nodes.get(id)
      if (node) this.nodes.set(id, Object.freeze({ ...node, isTarget: true }))
    }
    return this
  }

  outDegree(id: string): number {
    return this.edges.reduce((count, e) => (e.source === id ? count + 1 : count), 0)
  }

  build(): GameModel {
    return createGame(this.name, [...this.nodes.values()], this.edges, this.timeBound)
  }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Assemble a game from complete node and edge lists. Later nodes with a
 * repeated id replace earlier ones; use GameBuilder to reject duplicates.
 *
 * @throws InvalidNodeError when an id or label cannot be written to a game file
 */
export function createGame(
  name: string,
  nodes: readonly GameNode[],
  edges: readonly GameEdge[],
  timeBound?: number
): GameModel {
  for (const node of nodes) {
    requireNodeId(node.id, 'Node id')
    requireLabel(node.id, node.label)
  }
  for (const edge of edges) {
    requireNodeId(edge.source, 'Edge source')
    requireNodeId(edge.target, 'Edge target')
  }
  const game: GameModel = {
    name,
    nodes: new Map(nodes.map((n) => [n.id, n])),
    edges: Object.freeze([...edges]),
    ...(timeBound !== undefined ? { timeBound } : {}),
  }
  return Object.freeze(game)
}

/** Copy of `game` whose target set is exactly `ids`. */
export function withTargets(game: GameModel, ids: Iterable<string>): GameModel {
  const targets = new Set(ids)
  const nodes = [...game.nodes.values()].map((n) => ({ ...n, isTarget: targets.has(n.id) }))
  return createGame(game.name, nodes, game.edges, game.timeBound)
}

// ============================================================================
// Queries
// ============================================================================

export function nodeIds(game: GameModel): string[] {
  return [...game.nodes.keys()]
}

export function targetIds(game: GameModel): string[] {
  return [...game.nodes.values()].filter((n) => n.isTarget).map((n) => n.id)
}

export function outDegree(game: GameModel, id: string): number {
  return game.edges.reduce((count, e) => (e.source === id ? count + 1 : count), 0)
}

/** Successor ids in edge order; repeated edges give repeated ids. */
export function successors(game: GameModel, id: string): string[] {
  return game.edges.filter((e) => e.source === id).map((e) => e.target)
}

/** Nodes without any outgoing edge. */
export function deadEnds(game: GameModel): string[] {
  const sources = new Set(game.edges.map((e) => e.source))
  return nodeIds(game).filter((id) => !sources.has(id))
}
