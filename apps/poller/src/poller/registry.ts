/**
 * Collector Registry
 *
 * Device kind -> (profile, collector). Kinds must be explicitly registered;
 * a kind with no entry is a configuration error at poll time.
 */

import { publishedSuffixes, schemaOf, type DeviceProfile } from './profiles.js'
import type { Collector, DeviceKind } from './types.js'

export interface CollectorBinding {
  kind: DeviceKind
  profile: DeviceProfile
  collector: Collector
  /** Ordered suffixes used to map positional fields */
  schema: readonly string[]
  /** Suffixes removed after normalization */
  excluded: readonly string[]
  /** Suffixes that survive exclusion */
  published: readonly string[]
}

export class InMemoryCollectorRegistry {
  private readonly bindings = new Map<DeviceKind, CollectorBinding>()

  /**
   * Register the collector for a device kind.
   * @throws Error if the kind is already registered
   * @throws Error if the collector speaks a different protocol than the profile
   */
  register(kind: DeviceKind, profile: DeviceProfile, collector: Collector): void {
    if (this.bindings.has(kind)) {
      throw new Error(`Collector for kind '${kind}' is already registered`)
    }
    if (collector.protocol !== profile.protocol) {
      throw new Error(
        `Kind '${kind}' declares protocol '${profile.protocol}' but its collector speaks '${collector.protocol}'`
      )
    }

    this.bindings.set(kind, {
      kind,
      profile,
      collector,
      schema: schemaOf(profile),
      excluded: [...profile.exclude],
      published: publishedSuffixes(profile),
    })
  }

  resolve(kind: DeviceKind): CollectorBinding | undefined {
    return this.bindings.get(kind)
  }

  has(kind: DeviceKind): boolean {
    return this.bindings.has(kind)
  }

  list(): DeviceKind[] {
    return Array.from(this.bindings.keys())
  }

  size(): number {
    return this.bindings.size
  }
}
