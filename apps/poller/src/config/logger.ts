/**
 * Poller Logger Configuration
 *
 * Pre-configured loggers for poller components
 */

import { createLogger } from '@fieldpoll/logger'

export const logger = createLogger('poller')

export const loggers = {
  scheduler: logger.child('scheduler'),
  scrape: logger.child('scrape'),
  query: logger.child('query'),
  sink: logger.child('sink'),
  config: logger.child('config'),
  server: logger.child('server'),
}
