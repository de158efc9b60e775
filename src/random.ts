/**
 * Random Source
 *
 * Seeded randomness for the synthesizers. A RandomSource is created by the
 * caller and passed explicitly to every function that draws from it, so a
 * seed fully determines the generated games and two independent sources
 * never share state.
 */

import { xoroshiro128plus, unsafeUniformIntDistribution } from 'pure-rand'
import { InvalidConfigError } from './errors'
import { loadEnvConfig } from './config'

export interface RandomSource {
  readonly seed: number
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number
  /** Uniform float in [0, 1). */
  float(): number
  /** Uniform float in [min, max). */
  uniform(min: number, max: number): number
  chance(probability: number): boolean
  pick<T>(items: readonly T[]): T
  /** `count` distinct items, in draw order. */
  sample<T>(items: readonly T[], count: number): T[]
  /** A key drawn with probability proportional to its weight. */
  weighted<K extends string>(weights: Readonly<Record<K, number>>): K
}

const UINT32_RANGE = 0x100000000

export function createRandomSource(seed: number): RandomSource {
  const rng = xoroshiro128plus(seed)

  const int = (min: number, max: number): number => {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min > max) {
      throw new RangeError(`Invalid integer range [${min}, ${max}]`)
    }
    return unsafeUniformIntDistribution(min, max, rng)
  }

  const float = (): number => unsafeUniformIntDistribution(0, UINT32_RANGE - 1, rng) / UINT32_RANGE

  return {
    seed,
    int,
    float,
    uniform: (min, max) => min + float() * (max - min),
    chance: (probability) => float() < probability,
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) throw new RangeError('Cannot pick from an empty list')
      return items[int(0, items.length - 1)]
    },
    sample<T>(items: readonly T[], count: number): T[] {
      if (count < 0 || count > items.length) {
        throw new RangeError(`Cannot sample ${count} items from ${items.length}`)
      }
      const pool = [...items]
      const out: T[] = []
      for (let i = 0; i < count; i++) {
        const j = int(i, pool.length - 1)
        const chosen = pool[j]
        pool[j] = pool[i]
        pool[i] = chosen
        out.push(chosen)
      }
      return out
    },
    weighted<K extends string>(weights: Readonly<Record<K, number>>): K {
      const entries: [K, number][] = []
      for (const key in weights) entries.push([key, weights[key]])
      const total = entries.reduce((sum, [, w]) => sum + Math.max(0, w), 0)
      if (!(total > 0)) throw new InvalidConfigError('Weights must sum to a positive number')
      let roll = float() * total
      for (const [key, w] of entries) {
        if (w <= 0) continue
        roll -= w
        if (roll < 0) return key
      }
      // Rounding can leave roll at exactly 0 after the last positive weight.
      const last = entries.filter(([, w]) => w > 0).pop()
      if (last === undefined) throw new InvalidConfigError('Weights must sum to a positive number')
      return last[0]
    },
  }
}

/** Source seeded from TEMPORAL_SEED (default 42). */
export function randomSourceFromEnv(env: Record<string, string | undefined> = process.env): RandomSource {
  return createRandomSource(loadEnvConfig(env).seed)
}
