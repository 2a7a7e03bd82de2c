/**
 * Poller entry point
 *
 * Loads configuration, registers the metric catalog, starts the exposition
 * server and runs the poll loop until SIGINT/SIGTERM.
 *
 * Usage:
 *   tsx src/main.ts                 # poll forever
 *   tsx src/main.ts --once          # one cycle, then exit
 *   tsx src/main.ts --check-config  # validate configuration and exit
 */

// Load environment variables first - this MUST be the first import
import './env.js'

import type { Server } from 'node:http'
import { parseCommand, USAGE, type PollerCommand } from './cli.js'
import { loggers } from './config/logger.js'
import { loadSettings, type PollerSettings } from './config/settings.js'
import { buildCollectorRegistry } from './poller/collectors/index.js'
import { buildCatalog, loadCatalogEntries, validateBindings, type BindingIssue, type MetricCatalog } from './poller/catalog.js'
import { countDevices, loadInventory } from './poller/inventory.js'
import { loadProfiles, type DeviceProfiles } from './poller/profiles.js'
import { PollScheduler } from './poller/scheduler.js'
import { RegistryMetricSink } from './poller/sink.js'
import type { Inventory } from './poller/types.js'
import { createMetricsApp, startMetricsServer, stopMetricsServer } from './server.js'

const log = loggers.config

interface LoadedConfig {
  inventory: Inventory
  profiles: DeviceProfiles
  catalog: MetricCatalog
  issues: BindingIssue[]
}

async function loadConfig(settings: PollerSettings, command: PollerCommand): Promise<LoadedConfig> {
  const inventoryPath = command.inventoryPath ?? settings.inventoryPath
  const profilesPath = command.profilesPath ?? settings.profilesPath
  const catalogPath = command.catalogPath ?? settings.catalogPath

  const [inventory, profiles, entries] = await Promise.all([
    loadInventory(inventoryPath),
    loadProfiles(profilesPath),
    loadCatalogEntries(catalogPath),
  ])
  const catalog = buildCatalog(entries)
  const issues = validateBindings(inventory, profiles, catalog)

  log.info('Configuration loaded', {
    inventoryPath,
    profilesPath,
    catalogPath,
    sites: inventory.length,
    devices: countDevices(inventory),
    profiles: profiles.size,
    metrics: catalog.size(),
  })

  for (const issue of issues) {
    log.warn(issue.type, { event_name: 'CONFIG_BINDING_ISSUE', ...issue })
  }

  return { inventory, profiles, catalog, issues }
}

async function main(): Promise<number> {
  const command = parseCommand(process.argv.slice(2))
  if (command.help) {
    process.stdout.write(`${USAGE}\n`)
    return 0
  }

  const settings = loadSettings()
  const { inventory, profiles, catalog, issues } = await loadConfig(settings, command)

  if (command.checkConfig) {
    log.info('Configuration check finished', { issues: issues.length })
    return issues.length > 0 ? 1 : 0
  }

  const scheduler = new PollScheduler({
    inventory,
    registry: buildCollectorRegistry(profiles, {
      scrape: settings.scrape,
      query: settings.query,
    }),
    sink: new RegistryMetricSink(catalog, loggers.sink),
    cadenceMs: settings.cadenceMs,
  })

  if (command.once) {
    const summary = await scheduler.runCycle()
    return summary.devicesAttempted > 0 && summary.devicesSucceeded === 0 ? 1 : 0
  }

  const app = createMetricsApp(catalog.registry, () => ({
    cycles: scheduler.cyclesCompleted,
    lastCycleAt: scheduler.lastCycle?.startedAt ?? null,
  }))
  const server: Server = await startMetricsServer(app, settings.metricsPort)

  const controller = new AbortController()
  const shutdown = (signal: string) => {
    if (controller.signal.aborted) {
      log.info('Shutdown already in progress', { signal })
      return
    }
    log.info('Shutdown requested; finishing current device', { signal })
    controller.abort()
  }
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))

  try {
    await scheduler.runForever(controller.signal)
  } finally {
    await stopMetricsServer(server)
    log.info('Metrics endpoint closed')
  }
  return 0
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    log.error('Poller failed to start', {}, error)
    process.exit(1)
  }
)
