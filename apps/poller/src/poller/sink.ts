/**
 * Metric Sink Adapter
 *
 * The only write path into the registry. Gauge.set is synchronous, so a
 * publish is atomic per name even when device polls interleave.
 */

import type { ILogger } from '@fieldpoll/logger'
import { configurationError } from './errors.js'
import type { MetricCatalog } from './catalog.js'
import type { MetricSink, PublishResult } from './types.js'

export class RegistryMetricSink implements MetricSink {
  private readonly reportedUnknown = new Set<string>()

  constructor(
    private readonly catalog: Pick<MetricCatalog, 'get'>,
    private readonly log: ILogger
  ) {}

  publish(name: string, value: number): PublishResult {
    const gauge = this.catalog.get(name)
    if (!gauge) {
      const error = configurationError(`Metric '${name}' is not in the catalog`, { metric: name })
      // Once per name; the same device would otherwise repeat it every cycle
      if (!this.reportedUnknown.has(name)) {
        this.reportedUnknown.add(name)
        this.log.warn('METRIC_NOT_REGISTERED', { event_name: 'METRIC_NOT_REGISTERED', metric: name }, error)
      }
      return { ok: false, error }
    }

    gauge.set(value)
    return { ok: true }
  }
}
