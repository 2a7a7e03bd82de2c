/**
 * Poll Scheduler
 *
 * Walks the inventory once per cycle, site by site and device by device, and
 * awaits each device before dispatching the next. After the last device it
 * pauses for the cadence before starting over.
 *
 * The pause is a fixed gap measured from the end of a cycle, not a fixed
 * period: slow or timed-out devices stretch the effective polling interval.
 * Each cycle's real duration is logged with POLL_CYCLE_COMPLETED.
 *
 * A device failure never reaches the loop. Collectors return classified
 * errors, and anything they or the normalizer throw is caught in pollDevice().
 */

import type { ILogger } from '@fieldpoll/logger'
import { loggers } from '../config/logger.js'
import { createDeviceLogger } from '../config/structured-log.js'
import { classifyPollError, configurationError, type PollError } from './errors.js'
import { exclusionSetFor, normalize } from './normalizer.js'
import { recordCycleCompleted, recordDeviceOutcome } from './metrics.js'
import type { InMemoryCollectorRegistry } from './registry.js'
import { sleep } from './utils/deadline.js'
import type { CycleSummary, Device, Inventory, MetricSink, PollOutcome, Site } from './types.js'

export interface PollSchedulerOptions {
  inventory: Inventory
  registry: Pick<InMemoryCollectorRegistry, 'resolve'>
  sink: MetricSink

  /** Pause after each cycle, in ms */
  cadenceMs: number

  logger?: ILogger

  /** Pause implementation (tests substitute an instant one) */
  pause?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export class PollScheduler {
  private readonly inventory: Inventory
  private readonly registry: Pick<InMemoryCollectorRegistry, 'resolve'>
  private readonly sink: MetricSink
  private readonly cadenceMs: number
  private readonly log: ILogger
  private readonly pause: (ms: number, signal?: AbortSignal) => Promise<void>

  private cycleCount = 0
  private lastSummary: CycleSummary | null = null
  private running = false
  private stopController: AbortController | null = null

  constructor(options: PollSchedulerOptions) {
    this.inventory = options.inventory
    this.registry = options.registry
    this.sink = options.sink
    this.cadenceMs = options.cadenceMs
    this.log = options.logger ?? loggers.scheduler
    this.pause = options.pause ?? sleep
  }

  get cyclesCompleted(): number {
    return this.cycleCount
  }

  get lastCycle(): CycleSummary | null {
    return this.lastSummary
  }

  isRunning(): boolean {
    return this.running
  }

  /**
   * Poll until stop() is called or `signal` aborts.
   * A stop request takes effect after the device currently being polled.
   */
  async runForever(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('Poll scheduler is already running')
    }

    const controller = new AbortController()
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })
    if (signal?.aborted) controller.abort()

    this.stopController = controller
    this.running = true
    this.log.info('Poll scheduler started', {
      sites: this.inventory.length,
      cadenceMs: this.cadenceMs,
    })

    try {
      while (!controller.signal.aborted) {
        await this.runCycle(controller.signal)
        if (controller.signal.aborted) break
        await this.pause(this.cadenceMs, controller.signal)
      }
    } finally {
      signal?.removeEventListener('abort', onAbort)
      this.running = false
      this.stopController = null
      this.log.info('Poll scheduler stopped', { cycles: this.cycleCount })
    }
  }

  stop(): void {
    this.stopController?.abort()
  }

  /**
   * One pass over the whole roster, in inventory order.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const cycle = this.cycleCount + 1
    const startedAt = new Date()
    const summary: CycleSummary = {
      cycle,
      startedAt,
      durationMs: 0,
      devicesAttempted: 0,
      devicesSucceeded: 0,
      devicesFailed: 0,
      devicesSkipped: 0,
      metricsPublished: 0,
    }

    roster: for (const site of this.inventory) {
      for (const device of site.devices) {
        if (signal?.aborted) break roster

        const outcome = await this.pollDevice(site, device, cycle)
        if (outcome.skipped) {
          summary.devicesSkipped++
          continue
        }
        summary.devicesAttempted++
        summary.metricsPublished += outcome.published.length
        if (outcome.ok) {
          summary.devicesSucceeded++
        } else {
          summary.devicesFailed++
        }
      }
    }

    summary.durationMs = Date.now() - startedAt.getTime()
    this.cycleCount = cycle
    this.lastSummary = summary
    recordCycleCompleted(summary, this.cadenceMs)
    return summary
  }

  /**
   * Collect, normalize and publish one device. Never rejects.
   */
  async pollDevice(site: Site, device: Device, cycle = this.cycleCount + 1): Promise<PollOutcome> {
    const startTime = Date.now()
    const envelope = { siteId: site.id, deviceId: device.id, kind: device.kind, cycle }
    const deviceLog = createDeviceLogger(this.log, envelope)

    const finish = (fields: Pick<PollOutcome, 'ok' | 'skipped' | 'published'>, error?: PollError): PollOutcome => {
      const outcome: PollOutcome = {
        siteId: site.id,
        deviceId: device.id,
        kind: device.kind,
        ...fields,
        ...(error ? { errorKind: error.kind } : {}),
        durationMs: Date.now() - startTime,
      }
      recordDeviceOutcome(deviceLog, outcome, error)
      return outcome
    }

    const binding = this.registry.resolve(device.kind)
    if (!binding) {
      return finish(
        { ok: false, skipped: true, published: [] },
        configurationError(`No collector registered for device kind '${device.kind}'`, { kind: device.kind })
      )
    }

    try {
      const result = await binding.collector.collect(device.address, site.id, {
        deviceId: device.id,
        logger: createDeviceLogger(loggers[binding.collector.protocol], { ...envelope, address: device.address }),
      })
      if (!result.ok) {
        return finish({ ok: false, skipped: false, published: [] }, result.error)
      }

      const metrics = normalize(
        site.id,
        result.fields,
        binding.schema,
        exclusionSetFor(site.id, binding.excluded),
        {
          onUnparsed: (name, raw) =>
            deviceLog.debug('Field has no numeric value', {
              errorKind: 'ParseError',
              metric: name,
              raw: typeof raw === 'string' ? raw : String(raw),
            }),
        }
      )

      const published: string[] = []
      for (const [name, value] of Object.entries(metrics)) {
        if (this.sink.publish(name, value).ok) {
          published.push(name)
        }
      }
      return finish({ ok: true, skipped: false, published })
    } catch (error) {
      return finish({ ok: false, skipped: false, published: [] }, classifyPollError(error))
    }
  }
}
