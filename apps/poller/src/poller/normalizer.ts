/**
 * Reading Normalizer
 *
 * Turns raw collector fields into site-prefixed canonical metrics.
 */

import type { CanonicalMetrics, RawFields, RawValue } from './types.js'

/**
 * Optional sign, optional leading digits, optional fractional part.
 * At least one digit is required so an empty match never parses.
 */
const NUMBER_PATTERN = /[-+]?\d*\.?\d+/

/**
 * First number found in a raw field, or undefined when there is none.
 *
 * Finite numbers pass through unchanged and bigints are converted (counters
 * beyond 2^53 lose precision). Strings and octet-string Buffers are scanned
 * as text.
 */
export function extractNumber(raw: RawValue): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined
  }
  if (typeof raw === 'bigint') {
    return Number(raw)
  }

  const text = typeof raw === 'string' ? raw : raw.toString()
  const match = NUMBER_PATTERN.exec(text)
  if (!match) {
    return undefined
  }

  const parsed = Number.parseFloat(match[0])
  return Number.isFinite(parsed) ? parsed : undefined
}

export function canonicalName(siteId: string, suffix: string): string {
  return `${siteId}_${suffix}`
}

/**
 * Site-prefixed names of fields that carry discrete state codes.
 */
export function exclusionSetFor(siteId: string, suffixes: readonly string[]): ReadonlySet<string> {
  return new Set(suffixes.map((suffix) => canonicalName(siteId, suffix)))
}

export interface NormalizeOptions {
  /** Called for every field that did not contain a number */
  onUnparsed?: (name: string, raw: RawValue) => void
}

/**
 * Map raw fields onto canonical names.
 *
 * Positional fields are zipped against `schema`; when the lengths differ the
 * extra entries on the longer side are ignored. Named fields keep their own
 * names. Unparseable values and names in `exclusionSet` never appear in the
 * result.
 */
export function normalize(
  siteId: string,
  rawFields: RawFields,
  schema: readonly string[],
  exclusionSet: ReadonlySet<string>,
  options: NormalizeOptions = {}
): CanonicalMetrics {
  const pairs: Array<[string, RawValue]> =
    rawFields.layout === 'positional'
      ? zipPositional(schema, rawFields.values)
      : rawFields.entries.map((entry) => [entry.name, entry.value])

  const result: CanonicalMetrics = {}
  for (const [suffix, raw] of pairs) {
    const name = canonicalName(siteId, suffix)
    const value = extractNumber(raw)
    if (value === undefined) {
      options.onUnparsed?.(name, raw)
      continue
    }
    result[name] = value
  }

  for (const name of exclusionSet) {
    delete result[name]
  }

  return result
}

function zipPositional(schema: readonly string[], values: readonly string[]): Array<[string, string]> {
  const length = Math.min(schema.length, values.length)
  const pairs: Array<[string, string]> = []
  for (let i = 0; i < length; i++) {
    pairs.push([schema[i], values[i]])
  }
  return pairs
}
