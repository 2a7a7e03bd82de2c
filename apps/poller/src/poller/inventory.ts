/**
 * Inventory Provider
 *
 * Loads the ordered site -> device roster. Order in the file is the order in
 * which devices are polled.
 */

import { z } from 'zod'
import { readJsonConfig, parseConfig } from '../config/json-file.js'
import type { Inventory, Site } from './types.js'

// Site ids prefix Prometheus metric names, so they must be valid name heads.
// This also rules out integer-like keys, which JSON objects would reorder.
const siteIdSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'site id must start with a letter or underscore and contain only letters, digits and underscores')

// Integer-like device ids would likewise be hoisted ahead of the rest.
const deviceIdSchema = z.string().min(1).regex(/\D/, 'device id must contain a non-digit character')

const deviceSchema = z.object({
  kind: z.string().min(1),
  address: z.string().min(1),
})

const inventoryFileSchema = z.object({
  sites: z.record(siteIdSchema, z.record(deviceIdSchema, deviceSchema)),
})

type InventoryFile = z.infer<typeof inventoryFileSchema>

function toInventory(file: InventoryFile): Inventory {
  const sites: Site[] = Object.entries(file.sites).map(([siteId, devices]) => ({
    id: siteId,
    devices: Object.entries(devices).map(([deviceId, device]) => ({
      id: deviceId,
      kind: device.kind,
      address: device.address.trim(),
    })),
  }))
  return Object.freeze(sites)
}

export function parseInventory(raw: unknown): Inventory {
  return toInventory(parseConfig('inventory', raw, inventoryFileSchema))
}

export async function loadInventory(path: string): Promise<Inventory> {
  return toInventory(await readJsonConfig('inventory', path, inventoryFileSchema))
}

export function countDevices(inventory: Inventory): number {
  return inventory.reduce((total, site) => total + site.devices.length, 0)
}
