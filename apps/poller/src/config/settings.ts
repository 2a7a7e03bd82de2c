/**
 * Poller settings, read from the environment.
 *
 * Relative paths resolve against the working directory; unset paths point
 * into apps/poller/config.
 */

import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { parseConfig } from './json-file.js'

const APP_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

export const CONFIG_DIR = resolve(APP_ROOT, 'config')

const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  INVENTORY_PATH: z.string().min(1).default(resolve(CONFIG_DIR, 'inventory.json')),
  PROFILES_PATH: z.string().min(1).default(resolve(CONFIG_DIR, 'profiles.json')),
  CATALOG_PATH: z.string().min(1).default(resolve(CONFIG_DIR, 'catalog.json')),
  POLL_CADENCE_SECONDS: positiveInt.default(60),
  METRICS_PORT: z.coerce.number().int().min(1).max(65_535).default(9100),
  SCRAPE_NAVIGATION_TIMEOUT_MS: positiveInt.default(45_000),
  SCRAPE_WAIT_CEILING_MS: positiveInt.default(45_000),
  SNMP_COMMUNITY: z.string().min(1).default('public'),
  SNMP_TIMEOUT_MS: positiveInt.default(5_000),
  SNMP_RETRIES: z.coerce.number().int().min(0).default(1),
})

export interface PollerSettings {
  inventoryPath: string
  profilesPath: string
  catalogPath: string
  cadenceMs: number
  metricsPort: number
  scrape: {
    navigationTimeoutMs: number
    waitCeilingMs: number
  }
  query: {
    community: string
    timeoutMs: number
    retries: number
  }
}

/**
 * Empty strings count as unset so a blank line in .env.local keeps the default.
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value
    }
  }
  return present
}

/**
 * @throws PollError (ConfigurationError) listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): PollerSettings {
  const parsed = parseConfig('environment', withoutBlanks(env), envSchema)
  return {
    inventoryPath: resolve(parsed.INVENTORY_PATH),
    profilesPath: resolve(parsed.PROFILES_PATH),
    catalogPath: resolve(parsed.CATALOG_PATH),
    cadenceMs: parsed.POLL_CADENCE_SECONDS * 1000,
    metricsPort: parsed.METRICS_PORT,
    scrape: {
      navigationTimeoutMs: parsed.SCRAPE_NAVIGATION_TIMEOUT_MS,
      waitCeilingMs: parsed.SCRAPE_WAIT_CEILING_MS,
    },
    query: {
      community: parsed.SNMP_COMMUNITY,
      timeoutMs: parsed.SNMP_TIMEOUT_MS,
      retries: parsed.SNMP_RETRIES,
    },
  }
}
