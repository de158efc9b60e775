/**
 * Configuration
 *
 * Zod schemas for the environment and for the batch synthesis settings
 * callers pass in. Environment values are read once, by the logger, at
 * import time; everything else is validated where it is handed over.
 */

import { z } from 'zod'
import type { ConstraintShape } from './constraint-synthesis'
import { InvalidConfigError } from './errors'
import { type Result, Ok, Err } from './result'

export { InvalidConfigError } from './errors'

// ============================================================================
// Environment
// ============================================================================

const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])

export type LogLevel = z.infer<typeof LogLevel>

const EnvSchema = z.object({
  LOG_LEVEL: LogLevel.default('info'),
  // Seed of the generated benchmark corpus
  TEMPORAL_SEED: z.coerce.number().int().default(42),
})

export type EnvConfig = {
  logLevel: LogLevel
  seed: number
}

/**
 * @throws InvalidConfigError listing every offending variable
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    TEMPORAL_SEED: env.TEMPORAL_SEED || undefined,
  })
  if (!parsed.success) {
    const issues = formatIssues(parsed.error)
    throw new InvalidConfigError(`Invalid environment: ${issues.join('; ')}`, issues)
  }
  return { logLevel: parsed.data.LOG_LEVEL, seed: parsed.data.TEMPORAL_SEED }
}

// ============================================================================
// Synthesis Settings
// ============================================================================

// Shape sizes: every synthesizer needs at least one node per dimension
const IntRangeSchema = z
  .object({
    min: z.number().int().positive(),
    max: z.number().int().positive(),
  })
  .refine((r) => r.min <= r.max, { message: 'min must not exceed max' })

const weight = () => z.number().nonnegative().optional()

const weightShape = {
  none: weight(),
  equality: weight(),
  modulo: weight(),
  greaterEqual: weight(),
  lessEqual: weight(),
  lessThan: weight(),
  explicitSet: weight(),
  conjunction: weight(),
  disjunction: weight(),
  negation: weight(),
} satisfies Record<ConstraintShape, z.ZodTypeAny>

export const ConstraintWeightsSchema = z
  .object(weightShape)
  .strict()
  .refine(
    (w) => Object.values(w).some((v) => v !== undefined && v > 0),
    { message: 'at least one shape needs a positive weight' }
  )

export const GameSetConfigSchema = z.object({
  count: z.number().int().positive().default(1000),
  chainLength: IntRangeSchema.default({ min: 3, max: 12 }),
  branchDepth: IntRangeSchema.default({ min: 2, max: 4 }),
  branchingFactor: IntRangeSchema.default({ min: 2, max: 3 }),
  cycleSize: IntRangeSchema.default({ min: 3, max: 10 }),
  denseSize: IntRangeSchema.default({ min: 4, max: 15 }),
  /** Share of each shape; games are assigned in this order by index. */
  mix: z
    .object({
      chain: z.number().nonnegative(),
      branching: z.number().nonnegative(),
      cycle: z.number().nonnegative(),
      dense: z.number().nonnegative(),
    })
    .refine((m) => m.chain + m.branching + m.cycle + m.dense > 0, { message: 'mix must not be all zero' })
    .default({ chain: 0.2, branching: 0.2, cycle: 0.2, dense: 0.4 }),
})

export type GameSetConfig = z.infer<typeof GameSetConfigSchema>
export type GameSetConfigInput = z.input<typeof GameSetConfigSchema>

export const BenchmarkConfigSchema = z.object({
  sizes: z.array(z.number().int().positive()).min(1).default([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]),
  gamesPerSize: z.number().int().positive().default(15),
  constraintWeights: ConstraintWeightsSchema.optional(),
})

export type BenchmarkConfig = z.infer<typeof BenchmarkConfigSchema>
export type BenchmarkConfigInput = z.input<typeof BenchmarkConfigSchema>

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

function parseWith<S extends z.ZodTypeAny>(schema: S, label: string, input: unknown): Result<z.infer<S>, InvalidConfigError> {
  const parsed = schema.safeParse(input ?? {})
  if (parsed.success) return Ok(parsed.data)
  const issues = formatIssues(parsed.error)
  return Err(new InvalidConfigError(`Invalid ${label}: ${issues.join('; ')}`, issues))
}

export function parseGameSetConfig(input: unknown): Result<GameSetConfig, InvalidConfigError> {
  return parseWith(GameSetConfigSchema, 'game set config', input)
}

export function parseBenchmarkConfig(input: unknown): Result<BenchmarkConfig, InvalidConfigError> {
  return parseWith(BenchmarkConfigSchema, 'benchmark config', input)
}
