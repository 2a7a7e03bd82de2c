/**
 * Builds one collector per device profile.
 */

import { InMemoryCollectorRegistry } from '../registry.js'
import type { DeviceProfile, DeviceProfiles } from '../profiles.js'
import type { Collector } from '../types.js'
import { QueryCollector, type QueryCollectorOptions } from './query-collector.js'
import { ScrapeCollector, type ScrapeCollectorOptions } from './scrape-collector.js'

export interface CollectorSettings {
  scrape?: Omit<ScrapeCollectorOptions, 'selector'>
  query?: Omit<QueryCollectorOptions, 'objects'>
}

export function createCollector(profile: DeviceProfile, settings: CollectorSettings = {}): Collector {
  switch (profile.protocol) {
    case 'scrape':
      return new ScrapeCollector({ ...settings.scrape, selector: profile.selector })
    case 'query':
      return new QueryCollector({ ...settings.query, objects: profile.objects })
  }
}

export function buildCollectorRegistry(
  profiles: DeviceProfiles,
  settings: CollectorSettings = {}
): InMemoryCollectorRegistry {
  const registry = new InMemoryCollectorRegistry()
  for (const [kind, profile] of profiles) {
    registry.register(kind, profile, createCollector(profile, settings))
  }
  return registry
}

export { ScrapeCollector } from './scrape-collector.js'
export { QueryCollector } from './query-collector.js'
