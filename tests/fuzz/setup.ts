/**
 * Vitest setup file.
 * Configures fast-check global defaults for the property tests.
 */
import * as fc from 'fast-check'

// FUZZ_ITERATIONS=500 or more for a deep run; the default keeps `npm test` fast
const requested = Number.parseInt(process.env.FUZZ_ITERATIONS ?? '', 10)
const numRuns = Number.isNaN(requested) ? 100 : requested

fc.configureGlobal({
  numRuns,
  verbose: process.env.FUZZ_VERBOSE === 'true',
})
