/**
 * Structured logging helpers for poll workflows.
 *
 * Every device-scoped line carries the same envelope so a site's history can
 * be filtered out of the stream.
 */

import type { ILogger, LogContext } from '@fieldpoll/logger'

export type PollLogContext = {
  siteId: string
  deviceId: string
  kind: string
  cycle?: number
  address?: string
  [key: string]: unknown
}

/**
 * Child logger with the device envelope as default context.
 * Undefined and null fields are left out.
 */
export function createDeviceLogger(base: ILogger, context: PollLogContext): ILogger {
  return base.child(compact(context))
}

/**
 * Context for an event line: `event_name` plus the non-empty metadata.
 */
export function eventMeta(event: string, meta: LogContext = {}): LogContext {
  return { event_name: event, ...compact(meta) }
}

function compact(value: Record<string, unknown>): LogContext {
  const next: LogContext = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
