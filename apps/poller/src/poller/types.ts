/**
 * Poller Core Types
 *
 * Inventory, raw collector output, collector/sink contracts and poll outcomes.
 */

import type { ILogger } from '@fieldpoll/logger'
import type { PollError } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Inventory
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Names a device profile. The profile decides the protocol and field layout.
 */
export type DeviceKind = string

export interface Device {
  /** Device identifier, unique within its site */
  id: string
  kind: DeviceKind
  /** Host or IP, optionally with :port; a scrape address may carry a scheme */
  address: string
}

export interface Site {
  /** Site identifier; prefixes every metric name published for the site */
  id: string
  /** Devices in inventory order */
  devices: Device[]
}

/**
 * Sites in inventory order. Loaded once at startup and never mutated.
 */
export type Inventory = readonly Site[]

// ═══════════════════════════════════════════════════════════════════════════════
// Raw collector output
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Value as returned by a network-management agent.
 * Integers arrive as numbers, Counter64 as a bigint, octet strings as Buffers.
 */
export type RawValue = string | number | bigint | Buffer

export interface NamedReading {
  name: string
  value: RawValue
}

/**
 * Scrape output is positional (value lines in page order); query output is
 * already keyed by the profile's object names.
 */
export type RawFields =
  | { layout: 'positional'; values: string[] }
  | { layout: 'named'; entries: NamedReading[] }

/**
 * Canonical metric name -> value. Names are `${siteId}_${suffix}`.
 */
export type CanonicalMetrics = Record<string, number>

// ═══════════════════════════════════════════════════════════════════════════════
// Error taxonomy
// ═══════════════════════════════════════════════════════════════════════════════

export type PollErrorKind =
  | 'ConnectivityTimeout' // Unreachable, or a ceiling was exceeded
  | 'ProtocolError' // Reachable device answered with something malformed
  | 'StructureError' // Device answered but the expected content is missing
  | 'ParseError' // A single field did not contain a number
  | 'ConfigurationError' // Unknown device kind or unregistered metric name

// ═══════════════════════════════════════════════════════════════════════════════
// Collector contract
// ═══════════════════════════════════════════════════════════════════════════════

export type CollectResult =
  | { ok: true; fields: RawFields }
  | { ok: false; error: PollError }

export interface CollectContext {
  deviceId: string
  logger: ILogger
}

/**
 * One implementation per protocol. Implementations own every network
 * resource they open and release it before the returned promise settles.
 * They must settle within their own ceiling and never reject.
 */
export interface Collector {
  readonly protocol: Protocol
  collect(address: string, site: string, ctx: CollectContext): Promise<CollectResult>
}

export type Protocol = 'scrape' | 'query'

// ═══════════════════════════════════════════════════════════════════════════════
// Sink contract
// ═══════════════════════════════════════════════════════════════════════════════

export type PublishResult =
  | { ok: true }
  | { ok: false; error: PollError }

/**
 * Overwrite-semantics write surface of the metric registry.
 * publish() is synchronous so interleaved device polls cannot tear a value.
 */
export interface MetricSink {
  publish(name: string, value: number): PublishResult
}

// ═══════════════════════════════════════════════════════════════════════════════
// Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

export interface PollOutcome {
  siteId: string
  deviceId: string
  kind: DeviceKind
  ok: boolean
  /** True when the device was never attempted (no collector for its kind) */
  skipped: boolean
  errorKind?: PollErrorKind
  /** Names published this attempt */
  published: string[]
  durationMs: number
}

export interface CycleSummary {
  cycle: number
  startedAt: Date
  durationMs: number
  devicesAttempted: number
  devicesSucceeded: number
  devicesFailed: number
  devicesSkipped: number
  metricsPublished: number
}
