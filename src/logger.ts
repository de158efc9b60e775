/**
 * Module logger.
 *
 * One pino instance for the library. Level comes from LOG_LEVEL.
 */

import pino from 'pino'
import { loadEnvConfig } from './config'

export const log = pino({
  name: 'temporal-games',
  level: loadEnvConfig().logLevel,
})
