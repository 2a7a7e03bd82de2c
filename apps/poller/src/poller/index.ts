/**
 * Polling engine
 *
 * Collects device readings over SNMP and rendered status pages, normalizes
 * them into site-prefixed names and publishes them to a prom-client registry.
 */

// Core types
export * from './types.js'
export { PollError, classifyPollError } from './errors.js'

// Configuration
export { parseInventory, loadInventory, countDevices } from './inventory.js'
export { parseProfiles, loadProfiles, schemaOf, publishedSuffixes, DEFAULT_TILE_SELECTOR } from './profiles.js'
export type { DeviceProfile, DeviceProfiles, ScrapeProfile, QueryProfile } from './profiles.js'
export {
  MetricCatalog,
  buildCatalog,
  parseCatalogEntries,
  loadCatalogEntries,
  validateBindings,
} from './catalog.js'
export type { CatalogEntry, BindingIssue } from './catalog.js'

// Collection
export { InMemoryCollectorRegistry } from './registry.js'
export type { CollectorBinding } from './registry.js'
export { buildCollectorRegistry, createCollector, ScrapeCollector, QueryCollector } from './collectors/index.js'
export type { CollectorSettings } from './collectors/index.js'

// Normalization and publishing
export { extractNumber, canonicalName, exclusionSetFor, normalize } from './normalizer.js'
export { RegistryMetricSink } from './sink.js'

// Scheduling
export { PollScheduler } from './scheduler.js'
export type { PollSchedulerOptions } from './scheduler.js'
