/**
 * Region Comparator
 *
 * Extracts winning regions from the two solvers' reports and compares them
 * as sets.
 *
 * Reachability solver:   W_<time> = {"s0", "s1"}
 * Player-region solver:  Player <p>:
 *                        Winning regions:
 *                          {s0, s1}
 *
 * A missing section is an empty region, never an error.
 */

// ============================================================================
// Types
// ============================================================================

export type WinningRegion = ReadonlySet<string>

export type RegionSchema = 'reachability' | 'playerRegions'

/** Region key (time index or player number) to node ids. */
export type RegionMap = ReadonlyMap<number, WinningRegion>

export type RegionComparison = {
  equal: boolean
  onlyInA: Set<string>
  onlyInB: Set<string>
  intersection: Set<string>
}

export type SolverOutputs = {
  reachabilityOutput: string
  playerOutput: string
  /** Index of the `W_<time>` line to compare; defaults to 0. */
  timeIndex?: number
  /** Player whose region is compared; defaults to 0. */
  player?: number
}

// ============================================================================
// Extraction
// ============================================================================

const REACHABILITY_LINE = /W_(\d+)\s*=\s*\{([^}]*)\}/g
const QUOTED_ID = /"([^"]+)"/g
const PLAYER_HEADER = /Player\s+(\d+)\s*:/g
const WINNING_REGIONS = /Winning regions:\s*\{([^}]*)\}/

function extractReachability(output: string): Map<number, Set<string>> {
  const regions = new Map<number, Set<string>>()
  for (const match of output.matchAll(REACHABILITY_LINE)) {
    const ids = [...match[2].matchAll(QUOTED_ID)].map((m) => m[1])
    regions.set(Number(match[1]), new Set(ids))
  }
  return regions
}

function extractPlayerRegions(output: string): Map<number, Set<string>> {
  const regions = new Map<number, Set<string>>()
  const headers = [...output.matchAll(PLAYER_HEADER)]
  headers.forEach((header, i) => {
    const start = (header.index ?? 0) + header[0].length
    const next = headers[i + 1]
    const end = next ? next.index ?? output.length : output.length
    const block = WINNING_REGIONS.exec(output.slice(start, end))
    const ids = block
      ? block[1].split(',').map((id) => id.trim()).filter((id) => id !== '')
      : []
    regions.set(Number(header[1]), new Set(ids))
  })
  return regions
}

export function extractRegions(output: string, schema: RegionSchema): RegionMap {
  switch (schema) {
    case 'reachability': return extractReachability(output)
    case 'playerRegions': return extractPlayerRegions(output)
  }
}

/** Region under `key`, or the empty region when the report has none. */
export function regionAt(regions: RegionMap, key: number): WinningRegion {
  return regions.get(key) ?? new Set<string>()
}

// ============================================================================
// Comparison
// ============================================================================

export function compareRegions(a: WinningRegion, b: WinningRegion): RegionComparison {
  const onlyInA = new Set([...a].filter((id) => !b.has(id)))
  const onlyInB = new Set([...b].filter((id) => !a.has(id)))
  const intersection = new Set([...a].filter((id) => b.has(id)))
  return { equal: onlyInA.size === 0 && onlyInB.size === 0, onlyInA, onlyInB, intersection }
}

/** Nodes of `all` outside `region`, e.g. player 1's region as the complement of W_0. */
export function complementRegion(all: Iterable<string>, region: WinningRegion): Set<string> {
  return new Set([...all].filter((id) => !region.has(id)))
}

/**
 * Compare `W_<timeIndex>` of the reachability report with `player`'s region
 * of the player-region report.
 */
export function compareSolverOutputs(outputs: SolverOutputs): RegionComparison {
  const reach = regionAt(extractRegions(outputs.reachabilityOutput, 'reachability'), outputs.timeIndex ?? 0)
  const player = regionAt(extractRegions(outputs.playerOutput, 'playerRegions'), outputs.player ?? 0)
  return compareRegions(reach, player)
}

/** `{a, b}` with ids sorted; `{}` when empty. */
export function formatRegion(region: WinningRegion): string {
  return `{${[...region].sort().join(', ')}}`
}
