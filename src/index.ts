/**
 * temporal-game-tools
 *
 * Public API exports
 */

// Error system: base class, codes and every error class
export {
  TemporalGameError, TemporalGameErrorCode,
  MalformedConstraintError, InvalidConstraintError, MalformedGameLineError,
  DuplicateNodeError, InvalidNodeError, InvalidShapeError, InvalidConfigError,
} from './errors'
export type { TemporalGameErrorCode as TemporalGameErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Constraint AST
export type { Constraint, ConstraintType, ComparisonType } from './constraint-ast'
export {
  always, eq, greaterEq, lessThan, lessEq, comparison, mod, explicitSet,
  not, and, or, allOf, anyOf,
  isAlways, isCompound, constraintDepth, constraintEquals,
  evaluateConstraint, availableTimes,
} from './constraint-ast'

// Constraint syntaxes
export { parsePolish, tryParsePolish, toPolish, MAX_NESTING_DEPTH } from './polish'
export { toInfix } from './infix'
export type {
  ConversionWarning, TranslationItem, TranslationOutcome, BatchTranslation,
} from './translator'
export { polishToInfix, translateConstraint, translateBatch } from './translator'

// Randomness
export type { RandomSource } from './random'
export { createRandomSource, randomSourceFromEnv } from './random'

// Constraint synthesis
export type {
  ConstraintShape, AtomicShape, CompoundShape, ConstraintWeights,
  IntRange, ConstraintRanges, ConstraintSynthesisOptions,
} from './constraint-synthesis'
export {
  CONSTRAINT_SHAPES, DEFAULT_CONSTRAINT_WEIGHTS, DEFAULT_CONSTRAINT_RANGES,
  isCompoundShape, synthesizeConstraint, synthesizeConstraintOfShape,
} from './constraint-synthesis'

// Game model
export type { Player, GameNode, GameEdge, GameModel, NodeInput } from './game-model'
export {
  GameBuilder, createGame, withTargets,
  nodeIds, targetIds, outDegree, successors, deadEnds,
} from './game-model'

// Game synthesis
export type { GameShapeSpec, GameShape, GameSynthesisOptions } from './game-synthesis'
export {
  TARGET_LABELS, DENSE_CONSTRAINT_WEIGHTS,
  synthesizeChain, synthesizeBranchingTree, synthesizeCycle, synthesizeDense,
  synthesizeGrid, synthesizeRacing, synthesizeDiamond, synthesizeBenchmark,
  applyLabelTargetRule, synthesizeGame, synthesizeGameSet, synthesizeBenchmarkSuite,
} from './game-synthesis'

// Codecs
export type { TgReadResult } from './tg-codec'
export { readTg, writeTg } from './tg-codec'
export type { DotNode, DotEdge, DotReadResult, DotWriteOptions } from './dot-codec'
export { dotGraphName, writeDot, readDot, extractDotTargets } from './dot-codec'

// Corpus conversion
export type {
  CorpusItem, ConvertedGame, ConversionFailure, CorpusOutcome, CorpusConversion,
} from './corpus-conversion'
export { convertTgToDot, convertCorpus, formatTargetLines } from './corpus-conversion'

// Validation
export type { GameViolation, GameViolationKind, TgValidationReport } from './game-validator'
export { validateGame, isValidGame, validateTgText } from './game-validator'

// Winning regions
export type {
  WinningRegion, RegionSchema, RegionMap, RegionComparison, SolverOutputs,
} from './region-comparator'
export {
  extractRegions, regionAt, compareRegions, complementRegion,
  compareSolverOutputs, formatRegion,
} from './region-comparator'

// Configuration & logging
export type {
  LogLevel, EnvConfig,
  GameSetConfig, GameSetConfigInput, BenchmarkConfig, BenchmarkConfigInput,
} from './config'
export {
  loadEnvConfig, ConstraintWeightsSchema, GameSetConfigSchema, BenchmarkConfigSchema,
  parseGameSetConfig, parseBenchmarkConfig,
} from './config'
export { log } from './logger'
