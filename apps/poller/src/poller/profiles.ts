/**
 * Device Profiles
 *
 * A profile binds a device kind to its protocol and an ordered field layout.
 * Metric names are derived only from these declared suffixes, never from
 * values found at runtime.
 */

import { z } from 'zod'
import { readJsonConfig, parseConfig } from '../config/json-file.js'
import type { DeviceKind } from './types.js'

export const DEFAULT_TILE_SELECTOR = '.tile'

const suffixSchema = z
  .string()
  .regex(/^[A-Za-z0-9_]+$/, 'metric suffix may only contain letters, digits and underscores')

const oidSchema = z.string().regex(/^\d+(\.\d+)+$/, 'OID must be dotted numeric')

const scrapeProfileSchema = z.object({
  protocol: z.literal('scrape'),
  /** CSS selector shared by both tile blocks */
  selector: z.string().min(1).default(DEFAULT_TILE_SELECTOR),
  /** One suffix per value line, in page order */
  fields: z.array(suffixSchema).min(1),
  /** Suffixes whose values are state codes rather than measurements */
  exclude: z.array(suffixSchema).default([]),
})

const queryProfileSchema = z.object({
  protocol: z.literal('query'),
  objects: z
    .array(z.object({ name: suffixSchema, oid: oidSchema }))
    .min(1),
  exclude: z.array(suffixSchema).default([]),
})

const profileSchema = z
  .discriminatedUnion('protocol', [scrapeProfileSchema, queryProfileSchema])
  .superRefine((profile, ctx) => {
    const names = schemaOf(profile)
    const seen = new Set<string>()
    names.forEach((name, index) => {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [profile.protocol === 'scrape' ? 'fields' : 'objects', index],
          message: `duplicate metric suffix '${name}'`,
        })
      }
      seen.add(name)
    })
    profile.exclude.forEach((name, index) => {
      if (!seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['exclude', index],
          message: `excluded suffix '${name}' is not a field of this profile`,
        })
      }
    })
  })

export const profilesFileSchema = z.record(z.string().min(1), profileSchema)

export type ScrapeProfile = z.infer<typeof scrapeProfileSchema>
export type QueryProfile = z.infer<typeof queryProfileSchema>
export type DeviceProfile = ScrapeProfile | QueryProfile
export type DeviceProfiles = ReadonlyMap<DeviceKind, DeviceProfile>

/**
 * Ordered metric suffixes a profile can produce, before exclusion.
 */
export function schemaOf(profile: DeviceProfile): string[] {
  return profile.protocol === 'scrape'
    ? [...profile.fields]
    : profile.objects.map((object) => object.name)
}

/**
 * Suffixes that can actually be published for a device of this profile.
 */
export function publishedSuffixes(profile: DeviceProfile): string[] {
  const excluded = new Set(profile.exclude)
  return schemaOf(profile).filter((suffix) => !excluded.has(suffix))
}

export function parseProfiles(raw: unknown): DeviceProfiles {
  return new Map(Object.entries(parseConfig('device profiles', raw, profilesFileSchema)))
}

export async function loadProfiles(path: string): Promise<DeviceProfiles> {
  const parsed = await readJsonConfig('device profiles', path, profilesFileSchema)
  return new Map(Object.entries(parsed))
}
