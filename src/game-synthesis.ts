/**
 * Game Synthesis
 *
 * Random game generators for the shape families used in the solver
 * comparison: chains, branching trees, cycles, dense graphs, grids, racing
 * paths, a diamond, and size-parameterized benchmark games.
 *
 * Every generator is a function of its parameters and a caller-owned
 * RandomSource. Each one gives every node at least one outgoing edge while
 * building (a node without successors loses trivially for its owner, which
 * makes the instance useless for comparison).
 */

import {
  type Constraint,
  always,
  greaterEq,
  lessEq,
  lessThan,
  mod,
  explicitSet,
  not,
  and,
  or,
} from './constraint-ast'
import {
  type ConstraintSynthesisOptions,
  type ConstraintWeights,
  synthesizeConstraint,
} from './constraint-synthesis'
import { GameBuilder, type GameModel, type Player, withTargets } from './game-model'
import type { RandomSource } from './random'
import type { GameSetConfig, BenchmarkConfig } from './config'
import { InvalidShapeError } from './errors'

export { InvalidShapeError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type GameShapeSpec =
  | { shape: 'chain'; length: number }
  | { shape: 'branching'; depth: number; branchingFactor: number }
  | { shape: 'cycle'; size: number }
  | { shape: 'dense'; size: number }
  | { shape: 'grid'; width: number; height: number }
  | { shape: 'racing'; paths: number; pathLength: number }
  | { shape: 'diamond' }
  | { shape: 'benchmark'; size: number }

export type GameShape = GameShapeSpec['shape']

export interface GameSynthesisOptions {
  name?: string
  /** Constraint distribution for shapes that draw from the general synthesizer (dense, benchmark). */
  constraints?: ConstraintSynthesisOptions
}

/** Labels that mark a node as a target under the label rule. */
export const TARGET_LABELS: readonly string[] = ['target', 'goal', 't']

/** Dense graphs draw from every shape with equal weight. */
export const DENSE_CONSTRAINT_WEIGHTS: Readonly<ConstraintWeights> = Object.freeze({
  none: 1,
  equality: 1,
  modulo: 1,
  greaterEqual: 1,
  lessEqual: 1,
  lessThan: 1,
  explicitSet: 1,
  conjunction: 1,
  disjunction: 1,
  negation: 1,
})

// ============================================================================
// Helpers
// ============================================================================

function requireCount(shape: string, name: string, value: number, min: number): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new InvalidShapeError(`${shape} requires ${name} >= ${min}, got ${value}`)
  }
}

function nodeId(index: number): string {
  return `s${index}`
}

function letterLabel(index: number): string {
  return index < 26 ? String.fromCharCode(97 + index) : `n${index}`
}

function randomOwner(random: RandomSource): Player {
  return random.chance(0.5) ? 1 : 0
}

function alternatingOwner(index: number): Player {
  return index % 2 === 0 ? 0 : 1
}

function randomModulo(random: RandomSource, minModulus: number, maxModulus: number): Constraint {
  const modulus = random.int(minModulus, maxModulus)
  return mod(modulus, random.int(0, modulus - 1))
}

function randomTimes(random: RandomSource, universe: number, minSize: number, maxSize: number): Constraint {
  const all = Array.from({ length: universe }, (_, i) => i)
  return explicitSet(random.sample(all, random.int(minSize, maxSize)))
}

function range(length: number): number[] {
  return Array.from({ length }, (_, i) => i)
}

/** Give every node that has no successor yet an unconstrained self-loop. */
function closeDeadEnds(builder: GameBuilder, ids: readonly string[]): void {
  for (const id of ids) {
    if (builder.outDegree(id) === 0) builder.addEdge(id, id, always())
  }
}

// ============================================================================
// Chain
// ============================================================================

/**
 * Nodes s0..s(n-1) linked in order. The first three links are
 * unconstrained so the end is reachable; later links get a modular or
 * window constraint. Longer chains also get a timed shortcut and a
 * timing self-loop. Target: the last node.
 */
export function synthesizeChain(random: RandomSource, length: number, options: GameSynthesisOptions = {}): GameModel {
  requireCount('chain', 'length', length, 1)
  const builder = new GameBuilder(options.name ?? `chain_${length}`)
  const ids = range(length).map(nodeId)

  ids.forEach((id, i) => builder.addNode({ id, owner: alternatingOwner(i), label: letterLabel(i) }))

  const mainPath = Math.min(3, length - 1)
  for (let i = 0; i < mainPath; i++) builder.addEdge(ids[i], ids[i + 1])

  for (let i = mainPath; i < length - 1; i++) {
    let constraint: Constraint = always()
    if (random.chance(0.7)) {
      if (random.chance(0.5)) {
        constraint = randomModulo(random, 2, 4)
      } else {
        const start = i * 2
        constraint = and(greaterEq(start), lessEq(start + random.int(5, 15)))
      }
    }
    builder.addEdge(ids[i], ids[i + 1], constraint)
  }

  if (length > 4) {
    const from = random.int(0, length - 3)
    const to = random.int(from + 2, length - 1)
    builder.addEdge(ids[from], ids[to], mod(3, 1))
    const loop = random.int(1, length - 2)
    builder.addEdge(ids[loop], ids[loop], mod(2, 0))
  }

  closeDeadEnds(builder, ids)
  builder.markTargets([ids[length - 1]])
  return builder.build()
}

// ============================================================================
// Branching Tree
// ============================================================================

function treeEdgeConstraint(random: RandomSource): Constraint {
  switch (random.pick(['always', 'modulo', 'explicit', 'compound'] as const)) {
    case 'always':
      return always()
    case 'modulo':
      return randomModulo(random, 2, 6)
    case 'explicit':
      return randomTimes(random, 15, 1, 4)
    case 'compound':
      if (random.chance(0.5)) {
        return or(mod(random.int(2, 4), 0), mod(random.int(2, 4), 1))
      }
      return not(mod(random.int(3, 5), 0))
  }
}

/**
 * Level l holds b^l nodes labelled `l<l>n<i>`; node i of level l links to
 * nodes i*b .. i*b+b-1 of level l+1. Leaves loop on themselves and are
 * the targets.
 */
export function synthesizeBranchingTree(
  random: RandomSource,
  depth: number,
  branchingFactor: number,
  options: GameSynthesisOptions = {}
): GameModel {
  requireCount('branching tree', 'depth', depth, 1)
  requireCount('branching tree', 'branchingFactor', branchingFactor, 1)
  const builder = new GameBuilder(options.name ?? `branch_${depth}_${branchingFactor}`)

  const levels: string[][] = []
  let counter = 0
  for (let level = 0; level < depth; level++) {
    const levelIds: string[] = []
    for (let i = 0; i < branchingFactor ** level; i++) {
      const id = nodeId(counter++)
      builder.addNode({ id, owner: randomOwner(random), label: `l${level}n${i}` })
      levelIds.push(id)
    }
    levels.push(levelIds)
  }

  for (let level = 0; level < depth - 1; level++) {
    const next = levels[level + 1]
    levels[level].forEach((source, i) => {
      for (const target of next.slice(i * branchingFactor, (i + 1) * branchingFactor)) {
        builder.addEdge(source, target, treeEdgeConstraint(random))
      }
    })
  }

  const leaves = levels[depth - 1]
  closeDeadEnds(builder, leaves)
  builder.markTargets(leaves)
  return builder.build()
}

// ============================================================================
// Cycle
// ============================================================================

function cycleEdgeConstraint(random: RandomSource): Constraint {
  switch (random.pick(['modulo', 'explicit', 'compound'] as const)) {
    case 'modulo':
      return randomModulo(random, 2, 7)
    case 'explicit':
      return randomTimes(random, 25, 2, 6)
    case 'compound': {
      if (random.chance(0.3)) {
        return and(mod(random.int(2, 4), 0), not(mod(random.int(3, 5), 0)))
      }
      if (random.chance(0.6)) {
        const modulus = random.int(2, 5)
        const [first, second] = random.sample(range(modulus), 2)
        return or(mod(modulus, first), mod(modulus, second))
      }
      return not(mod(random.int(3, 6), 0))
    }
  }
}

/**
 * Ring s0 -> s1 -> ... -> s0 where no ring edge is unconstrained, plus
 * random modular self-loops and timed shortcuts to non-adjacent nodes.
 * Target: the last node.
 */
export function synthesizeCycle(random: RandomSource, size: number, options: GameSynthesisOptions = {}): GameModel {
  requireCount('cycle', 'size', size, 1)
  const builder = new GameBuilder(options.name ?? `cycle_${size}`)
  const ids = range(size).map(nodeId)

  ids.forEach((id, i) => builder.addNode({ id, owner: randomOwner(random), label: `c${i}` }))

  ids.forEach((id, i) => builder.addEdge(id, ids[(i + 1) % size], cycleEdgeConstraint(random)))

  ids.forEach((id, i) => {
    if (random.chance(0.3)) builder.addEdge(id, id, mod(random.int(2, 4), 0))
    if (size > 3 && random.chance(0.2)) {
      const candidates = ids.filter((_, j) => j !== i && j !== (i + 1) % size && j !== (i - 1 + size) % size)
      if (candidates.length > 0) {
        builder.addEdge(id, random.pick(candidates), randomTimes(random, 15, 1, 3))
      }
    }
  })

  builder.markTargets([ids[size - 1]])
  return builder.build()
}

// ============================================================================
// Dense
// ============================================================================

/**
 * Every ordered pair (i, j), i != j, becomes an edge with probability
 * min(0.3, 6/n). Labels are `start`, `target` and a mix of names in between;
 * targets follow the label rule.
 */
export function synthesizeDense(random: RandomSource, size: number, options: GameSynthesisOptions = {}): GameModel {
  requireCount('dense graph', 'size', size, 1)
  const builder = new GameBuilder(options.name ?? `complex_${size}`)
  const ids = range(size).map(nodeId)
  const constraintOptions = options.constraints ?? { weights: DENSE_CONSTRAINT_WEIGHTS }

  ids.forEach((id, i) => {
    let label: string
    if (i === 0) label = 'start'
    else if (i === size - 1) label = 'target'
    else label = random.pick([`n${i}`, `state${i}`, String.fromCharCode(97 + (i % 26))])
    builder.addNode({ id, owner: randomOwner(random), label })
  })

  const probability = Math.min(0.3, 6 / size)
  for (let i = 0; i < size; i++) {
    for (let j = 0; j < size; j++) {
      if (i !== j && random.chance(probability)) {
        builder.addEdge(ids[i], ids[j], synthesizeConstraint(random, constraintOptions))
      }
    }
  }

  for (const id of ids) {
    if (builder.outDegree(id) === 0) {
      const others = ids.filter((other) => other !== id)
      builder.addEdge(id, others.length > 0 ? random.pick(others) : id, always())
    }
  }

  return applyLabelTargetRule(builder.build())
}

// ============================================================================
// Grid
// ============================================================================

/**
 * Checkerboard-owned grid with right and down moves. Moves on the first and
 * last interior lines are unconstrained; the rest are timed. Some diagonal
 * shortcuts open only on multiples of 5 from time 3. Target: bottom-right.
 */
export function synthesizeGrid(
  random: RandomSource,
  width: number,
  height: number,
  options: GameSynthesisOptions = {}
): GameModel {
  requireCount('grid', 'width', width, 1)
  requireCount('grid', 'height', height, 1)
  const builder = new GameBuilder(options.name ?? `grid_${width}x${height}`)
  const at = (x: number, y: number): string => nodeId(y * width + x)

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      builder.addNode({ id: at(x, y), owner: (x + y) % 2 === 0 ? 0 : 1, label: `(${x},${y})` })
    }
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const current = at(x, y)
      if (x < width - 1) {
        const critical = x === 0 || x === width - 2
        builder.addEdge(current, at(x + 1, y), critical ? always() : not(mod(4, x % 4)))
      }
      if (y < height - 1) {
        const critical = y === 0 || y === height - 2
        builder.addEdge(current, at(x, y + 1), critical ? always() : greaterEq(y * 2))
      }
      if (x < width - 1 && y < height - 1 && random.chance(0.3)) {
        builder.addEdge(current, at(x + 1, y + 1), and(greaterEq(3), mod(5, 0)))
      }
    }
  }

  const corner = at(width - 1, height - 1)
  closeDeadEnds(builder, [corner])
  builder.markTargets([corner])
  return builder.build()
}

// ============================================================================
// Racing
// ============================================================================

/**
 * Several routes from s0 to a common target: an unconstrained fast path,
 * a path timed on `t mod 3`, and delayed mixed paths with a deadline.
 */
export function synthesizeRacing(
  random: RandomSource,
  paths: number,
  pathLength: number,
  options: GameSynthesisOptions = {}
): GameModel {
  requireCount('racing', 'paths', paths, 1)
  requireCount('racing', 'pathLength', pathLength, 1)
  const builder = new GameBuilder(options.name ?? `racing_${paths}_${pathLength}`)
  let counter = 0

  const start = nodeId(counter++)
  builder.addNode({ id: start, owner: 0 })

  const routes: string[][] = []
  for (let p = 0; p < paths; p++) {
    const route = [start]
    for (let i = 0; i < pathLength - 1; i++) {
      const id = nodeId(counter++)
      builder.addNode({ id, owner: alternatingOwner(p + i + 1) })
      route.push(id)
    }
    routes.push(route)
  }

  const target = nodeId(counter++)
  builder.addNode({ id: target, owner: 0, isTarget: true })

  routes.forEach((route, p) => {
    const last = route[route.length - 1]
    for (let i = 0; i < route.length - 1; i++) {
      let constraint: Constraint
      if (p === 0) constraint = always()
      else if (p === 1) constraint = mod(3, i % 3)
      else if (i === 0) constraint = greaterEq(p * 2)
      else if (i === route.length - 2) constraint = always()
      else constraint = random.chance(0.5) ? always() : not(mod(4, 3))
      builder.addEdge(route[i], route[i + 1], constraint)
    }
    if (p === 0) builder.addEdge(last, target, always())
    else if (p === 1) builder.addEdge(last, target, mod(3, 2))
    else builder.addEdge(last, target, lessThan(20))
  })

  if (routes.length > 1 && pathLength > 2) {
    const [first, second] = random.sample(routes, 2)
    const from = first[random.int(1, first.length - 2)]
    const to = second[random.int(1, second.length - 2)]
    builder.addEdge(from, to, mod(5, 0))
  }

  closeDeadEnds(builder, [target])
  return builder.build()
}

// ============================================================================
// Diamond
// ============================================================================

/**
 * start -> top | bottom -> merge -> target. The top branch can be blocked
 * every third step; the bottom one only delays. Needs no randomness.
 */
export function synthesizeDiamond(options: GameSynthesisOptions = {}): GameModel {
  const [start, top, bottom, merge, target] = range(5).map(nodeId)
  return new GameBuilder(options.name ?? 'diamond')
    .addNode({ id: start, owner: 0 })
    .addNode({ id: top, owner: 1 })
    .addNode({ id: bottom, owner: 1 })
    .addNode({ id: merge, owner: 0 })
    .addNode({ id: target, owner: 0, isTarget: true })
    .addEdge(start, top)
    .addEdge(top, merge, not(mod(3, 2)))
    .addEdge(start, bottom, greaterEq(1))
    .addEdge(bottom, merge)
    .addEdge(merge, target, lessThan(15))
    .addEdge(start, start, mod(2, 1))
    .addEdge(top, top, mod(4, 0))
    .addEdge(bottom, bottom, mod(3, 0))
    .addEdge(target, target)
    .build()
}

// ============================================================================
// Benchmark
// ============================================================================

/**
 * Benchmark game over v0..v(n-1): random owners, 10-20% targets (at least
 * one), one edge out of every node and then random extra edges up to
 * 1.5-3x the node count, plus a time bound that grows with n.
 */
export function synthesizeBenchmark(random: RandomSource, size: number, options: GameSynthesisOptions = {}): GameModel {
  requireCount('benchmark', 'size', size, 1)
  const builder = new GameBuilder(options.name ?? `benchmark_${size}`)
  const ids = range(size).map((i) => `v${i}`)

  for (const id of ids) builder.addNode({ id, owner: randomOwner(random) })

  const targetCount = Math.max(1, Math.floor(size * random.uniform(0.1, 0.2)))
  builder.markTargets(random.sample(ids, targetCount))

  const edgeCount = Math.floor(size * random.uniform(1.5, 3.0))
  for (const id of ids) {
    builder.addEdge(id, random.pick(ids), synthesizeConstraint(random, options.constraints))
  }
  for (let i = 0; i < edgeCount - size; i++) {
    const source = random.pick(ids)
    const target = random.pick(ids)
    builder.addEdge(source, target, synthesizeConstraint(random, options.constraints))
  }

  builder.setTimeBound(random.int(Math.max(5, Math.floor(size / 10)), Math.max(10, Math.floor(size / 5))))
  return builder.build()
}

// ============================================================================
// Target Rules
// ============================================================================

/**
 * Mark the last declared node and every node labelled `target`, `goal` or
 * `t` as a target, keeping targets already set.
 */
export function applyLabelTargetRule(game: GameModel): GameModel {
  const nodes = [...game.nodes.values()]
  const last = nodes[nodes.length - 1]
  const targets = nodes
    .filter((n) => n.isTarget || n === last || TARGET_LABELS.includes(n.label))
    .map((n) => n.id)
  return withTargets(game, targets)
}

// ============================================================================
// Dispatch & Batches
// ============================================================================

export function synthesizeGame(spec: GameShapeSpec, random: RandomSource, options?: GameSynthesisOptions): GameModel {
  switch (spec.shape) {
    case 'chain': return synthesizeChain(random, spec.length, options)
    case 'branching': return synthesizeBranchingTree(random, spec.depth, spec.branchingFactor, options)
    case 'cycle': return synthesizeCycle(random, spec.size, options)
    case 'dense': return synthesizeDense(random, spec.size, options)
    case 'grid': return synthesizeGrid(random, spec.width, spec.height, options)
    case 'racing': return synthesizeRacing(random, spec.paths, spec.pathLength, options)
    case 'diamond': return synthesizeDiamond(options)
    case 'benchmark': return synthesizeBenchmark(random, spec.size, options)
  }
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0')
}

function shapeSuffix(spec: GameShapeSpec): string {
  switch (spec.shape) {
    case 'chain': return `chain_${spec.length}`
    case 'branching': return `branch_${spec.depth}_${spec.branchingFactor}`
    case 'cycle': return `cycle_${spec.size}`
    case 'dense': return `complex_${spec.size}`
    case 'grid': return `grid_${spec.width}x${spec.height}`
    case 'racing': return `racing_${spec.paths}_${spec.pathLength}`
    case 'diamond': return 'diamond'
    case 'benchmark': return `benchmark_${spec.size}`
  }
}

/**
 * Shape for game `index` of a set: the mix is laid out in blocks by index
 * (chains first, then trees, cycles, dense graphs), sizes drawn per game.
 */
function gameSetSpec(config: GameSetConfig, index: number, random: RandomSource): GameShapeSpec {
  const { mix, count } = config
  const total = mix.chain + mix.branching + mix.cycle + mix.dense
  const chainEnd = Math.floor((count * mix.chain) / total)
  const branchEnd = Math.floor((count * (mix.chain + mix.branching)) / total)
  const cycleEnd = Math.floor((count * (mix.chain + mix.branching + mix.cycle)) / total)
  const draw = (r: { min: number; max: number }): number => random.int(r.min, r.max)

  if (index < chainEnd) return { shape: 'chain', length: draw(config.chainLength) }
  if (index < branchEnd) {
    const depth = draw(config.branchDepth)
    return { shape: 'branching', depth, branchingFactor: draw(config.branchingFactor) }
  }
  if (index < cycleEnd) return { shape: 'cycle', size: draw(config.cycleSize) }
  return { shape: 'dense', size: draw(config.denseSize) }
}

/**
 * A corpus of `config.count` games named `game_0001_chain_5` and so on.
 */
export function synthesizeGameSet(config: GameSetConfig, random: RandomSource): GameModel[] {
  const games: GameModel[] = []
  for (let i = 0; i < config.count; i++) {
    const spec = gameSetSpec(config, i, random)
    games.push(synthesizeGame(spec, random, { name: `game_${pad(i + 1, 4)}_${shapeSuffix(spec)}` }))
  }
  return games
}

/**
 * `gamesPerSize` benchmark games for each size, named `test001`, `test002`, ...
 */
export function synthesizeBenchmarkSuite(config: BenchmarkConfig, random: RandomSource): GameModel[] {
  const games: GameModel[] = []
  const constraints = config.constraintWeights ? { weights: config.constraintWeights } : undefined
  let id = 1
  for (const size of config.sizes) {
    for (let i = 0; i < config.gamesPerSize; i++) {
      games.push(synthesizeBenchmark(random, size, {
        name: `test${pad(id++, 3)}`,
        ...(constraints ? { constraints } : {}),
      }))
    }
  }
  return games
}
