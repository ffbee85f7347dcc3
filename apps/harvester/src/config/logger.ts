/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@gpuwatch/logger'

export const rootLogger = createLogger('harvester')

export const loggers = {
  config: rootLogger.child('config'),
  catalog: rootLogger.child('catalog'),
  fetch: rootLogger.child('fetch'),
  proxy: rootLogger.child('proxy'),
  redis: rootLogger.child('redis'),
  dedupe: rootLogger.child('dedupe'),
  parser: rootLogger.child('parser'),
  extractor: rootLogger.child('extractor'),
  filters: rootLogger.child('filters'),
  pipeline: rootLogger.child('pipeline'),
  cli: rootLogger.child('cli'),
}
