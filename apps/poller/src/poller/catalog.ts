/**
 * Metric Catalog
 *
 * Canonical metric name -> registry handle. Every gauge is created and
 * registered before the first cycle; nothing is added at poll time.
 */

import { Gauge, Registry } from 'prom-client'
import { z } from 'zod'
import { readJsonConfig, parseConfig } from '../config/json-file.js'
import { canonicalName } from './normalizer.js'
import { publishedSuffixes, type DeviceProfiles } from './profiles.js'
import type { Inventory } from './types.js'

const metricNameSchema = z
  .string()
  .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'not a valid Prometheus metric name')

const catalogFileSchema = z.object({
  metrics: z.record(metricNameSchema, z.object({ help: z.string().min(1) })),
})

export interface CatalogEntry {
  name: string
  help: string
}

export class MetricCatalog {
  private readonly gauges = new Map<string, Gauge>()

  constructor(readonly registry: Registry) {}

  /**
   * Register a gauge for a canonical name.
   * @throws Error if the name is already in the catalog
   */
  register(entry: CatalogEntry): Gauge {
    if (this.gauges.has(entry.name)) {
      throw new Error(`Metric '${entry.name}' is already registered`)
    }
    const gauge = new Gauge({
      name: entry.name,
      help: entry.help,
      registers: [this.registry],
    })
    this.gauges.set(entry.name, gauge)
    return gauge
  }

  get(name: string): Gauge | undefined {
    return this.gauges.get(name)
  }

  has(name: string): boolean {
    return this.gauges.has(name)
  }

  names(): string[] {
    return Array.from(this.gauges.keys())
  }

  size(): number {
    return this.gauges.size
  }
}

export function buildCatalog(entries: readonly CatalogEntry[], registry: Registry = new Registry()): MetricCatalog {
  const catalog = new MetricCatalog(registry)
  for (const entry of entries) {
    catalog.register(entry)
  }
  return catalog
}

function toEntries(file: z.infer<typeof catalogFileSchema>): CatalogEntry[] {
  return Object.entries(file.metrics).map(([name, { help }]) => ({ name, help }))
}

export function parseCatalogEntries(raw: unknown): CatalogEntry[] {
  return toEntries(parseConfig('metric catalog', raw, catalogFileSchema))
}

export async function loadCatalogEntries(path: string): Promise<CatalogEntry[]> {
  return toEntries(await readJsonConfig('metric catalog', path, catalogFileSchema))
}

// ═══════════════════════════════════════════════════════════════════════════════
// Load-time binding validation
// ═══════════════════════════════════════════════════════════════════════════════

export type BindingIssue =
  | { type: 'UNKNOWN_KIND'; siteId: string; deviceId: string; kind: string }
  | { type: 'UNREGISTERED_METRIC'; siteId: string; deviceId: string; kind: string; metric: string }

/**
 * Check that every device kind has a profile and that every name a profile
 * can publish for a site is in the catalog.
 *
 * Issues are reported, not fatal: the scheduler skips the same cases at
 * poll time.
 */
export function validateBindings(
  inventory: Inventory,
  profiles: DeviceProfiles,
  catalog: Pick<MetricCatalog, 'has'>
): BindingIssue[] {
  const issues: BindingIssue[] = []

  for (const site of inventory) {
    for (const device of site.devices) {
      const profile = profiles.get(device.kind)
      if (!profile) {
        issues.push({ type: 'UNKNOWN_KIND', siteId: site.id, deviceId: device.id, kind: device.kind })
        continue
      }
      for (const suffix of publishedSuffixes(profile)) {
        const metric = canonicalName(site.id, suffix)
        if (!catalog.has(metric)) {
          issues.push({
            type: 'UNREGISTERED_METRIC',
            siteId: site.id,
            deviceId: device.id,
            kind: device.kind,
            metric,
          })
        }
      }
    }
  }

  return issues
}
