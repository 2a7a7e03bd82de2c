import { describe, it, expect } from 'vitest'
import { resolve } from 'node:path'
import { countDevices, loadInventory, parseInventory } from '../inventory.js'
import { CONFIG_DIR } from '../../config/settings.js'

describe('parseInventory', () => {
  it('keeps site and device order from the file', () => {
    const inventory = parseInventory({
      sites: {
        Ridge: {
          Solar: { kind: 'charge-controller', address: '10.0.1.5' },
          Radio: { kind: 'backhaul-radio', address: ' 10.0.1.2 ' },
        },
        Pine: { Solar: { kind: 'charge-controller', address: '10.0.0.5' } },
      },
    })

    expect(inventory).toEqual([
      {
        id: 'Ridge',
        devices: [
          { id: 'Solar', kind: 'charge-controller', address: '10.0.1.5' },
          { id: 'Radio', kind: 'backhaul-radio', address: '10.0.1.2' },
        ],
      },
      { id: 'Pine', devices: [{ id: 'Solar', kind: 'charge-controller', address: '10.0.0.5' }] },
    ])
    expect(Object.isFrozen(inventory)).toBe(true)
    expect(countDevices(inventory)).toBe(3)
  })

  it('rejects site ids that cannot prefix a metric name', () => {
    expect(() =>
      parseInventory({ sites: { 'Pine Ridge': { Solar: { kind: 'charge-controller', address: '10.0.0.5' } } } })
    ).toThrow(/site id must start with a letter or underscore/)
  })

  it('rejects integer-like device ids', () => {
    const raw: unknown = JSON.parse(
      '{"sites":{"Pine":{"10":{"kind":"charge-controller","address":"10.0.0.5"},"2":{"kind":"backhaul-radio","address":"10.0.0.2"}}}}'
    )

    expect(() => parseInventory(raw)).toThrow(/device id must contain a non-digit character/)
  })

  it('keeps device order for ids that mix digits and letters', () => {
    const inventory = parseInventory({
      sites: {
        Pine: {
          radio10: { kind: 'backhaul-radio', address: '10.0.0.10' },
          radio2: { kind: 'backhaul-radio', address: '10.0.0.2' },
        },
      },
    })

    expect(inventory[0].devices.map((device) => device.id)).toEqual(['radio10', 'radio2'])
  })

  it('rejects devices without an address', () => {
    expect(() => parseInventory({ sites: { Pine: { Solar: { kind: 'charge-controller' } } } })).toThrow(
      /Invalid inventory: sites\.Pine\.Solar\.address/
    )
  })

  it('accepts a site with no devices', () => {
    expect(parseInventory({ sites: { Pine: {} } })).toEqual([{ id: 'Pine', devices: [] }])
  })
})

describe('loadInventory', () => {
  it('loads the example inventory', async () => {
    const inventory = await loadInventory(resolve(CONFIG_DIR, 'inventory.example.json'))

    expect(inventory.map((site) => site.id)).toEqual(['Pine', 'Ridge'])
    expect(countDevices(inventory)).toBe(5)
  })
})
