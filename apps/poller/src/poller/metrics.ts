/**
 * Poller Telemetry
 *
 * Cycle and device outcomes are emitted as structured log events only.
 * The registry carries device readings and nothing else; a device that keeps
 * failing shows up here and as stale values, not as a liveness gauge.
 */

import type { ILogger } from '@fieldpoll/logger'
import { eventMeta } from '../config/structured-log.js'
import { loggers } from '../config/logger.js'
import type { PollError } from './errors.js'
import type { CycleSummary, PollOutcome } from './types.js'

const log = loggers.scheduler

export function recordCycleCompleted(summary: CycleSummary, cadenceMs: number): void {
  log.info(
    'POLL_CYCLE_COMPLETED',
    eventMeta('POLL_CYCLE_COMPLETED', {
      cycle: summary.cycle,
      startedAt: summary.startedAt.toISOString(),
      durationMs: summary.durationMs,
      devicesAttempted: summary.devicesAttempted,
      devicesSucceeded: summary.devicesSucceeded,
      devicesFailed: summary.devicesFailed,
      devicesSkipped: summary.devicesSkipped,
      metricsPublished: summary.metricsPublished,
      // The next cycle starts after the pause, so this is the real period
      effectivePeriodMs: summary.durationMs + cadenceMs,
    })
  )

  if (summary.devicesAttempted > 0 && summary.devicesSucceeded === 0) {
    log.warn(
      'POLL_CYCLE_NO_SUCCESS',
      eventMeta('POLL_CYCLE_NO_SUCCESS', {
        cycle: summary.cycle,
        devicesAttempted: summary.devicesAttempted,
      })
    )
  }
}

/**
 * Log one device attempt through the device-scoped logger, so site and device
 * ids come from its envelope.
 */
export function recordDeviceOutcome(deviceLog: ILogger, outcome: PollOutcome, error?: PollError): void {
  if (outcome.ok) {
    deviceLog.debug(
      'DEVICE_POLL_SUCCEEDED',
      eventMeta('DEVICE_POLL_SUCCEEDED', {
        published: outcome.published.length,
        durationMs: outcome.durationMs,
      })
    )
    return
  }

  const event = outcome.skipped ? 'DEVICE_POLL_SKIPPED' : 'DEVICE_POLL_FAILED'
  deviceLog.warn(
    event,
    eventMeta(event, {
      errorKind: outcome.errorKind,
      durationMs: outcome.durationMs,
      ...error?.details,
    }),
    error
  )
}
