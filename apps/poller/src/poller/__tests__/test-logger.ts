import { vi } from 'vitest'
import type { ILogger } from '@fieldpoll/logger'

/**
 * Logger whose methods are spies. child() returns the same instance so
 * device-scoped lines land on the same spies.
 */
export function createTestLogger() {
  const logger = {
    debug: vi.fn<ILogger['debug']>(),
    info: vi.fn<ILogger['info']>(),
    warn: vi.fn<ILogger['warn']>(),
    error: vi.fn<ILogger['error']>(),
    fatal: vi.fn<ILogger['fatal']>(),
    child: vi.fn<ILogger['child']>(),
  }
  logger.child.mockReturnValue(logger)
  return logger
}
