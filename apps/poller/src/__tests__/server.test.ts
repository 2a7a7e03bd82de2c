import { describe, it, expect } from 'vitest'
import request from 'supertest'
import { Registry } from 'prom-client'
import { buildCatalog } from '../poller/catalog.js'
import { createMetricsApp } from '../server.js'

function setup() {
  const registry = new Registry()
  const catalog = buildCatalog(
    [
      { name: 'Pine_array_current', help: 'Pine array current (A)' },
      { name: 'Pine_array_voltage', help: 'Pine array voltage (V)' },
    ],
    registry
  )
  return { registry, catalog }
}

describe('metrics app', () => {
  it('serves the registry in exposition format', async () => {
    const { registry, catalog } = setup()
    catalog.get('Pine_array_current')?.set(84)
    catalog.get('Pine_array_voltage')?.set(12.1)
    const app = createMetricsApp(registry, () => ({ cycles: 0, lastCycleAt: null }))

    const res = await request(app).get('/metrics')

    expect(res.status).toBe(200)
    expect(res.headers['content-type']).toContain('text/plain')
    expect(res.text).toContain('Pine_array_current 84\n')
    expect(res.text).toContain('Pine_array_voltage 12.1\n')
  })

  it('reports poll progress on /health', async () => {
    const { registry } = setup()
    const app = createMetricsApp(registry, () => ({
      cycles: 3,
      lastCycleAt: new Date('2026-01-02T03:04:05.000Z'),
    }))

    const res = await request(app).get('/health')

    expect(res.status).toBe(200)
    expect(res.body).toEqual({ status: 'ok', cycles: 3, lastCycleAt: '2026-01-02T03:04:05.000Z' })
  })

  it('reports a null lastCycleAt before the first cycle', async () => {
    const { registry } = setup()
    const app = createMetricsApp(registry, () => ({ cycles: 0, lastCycleAt: null }))

    const res = await request(app).get('/health')

    expect(res.body).toEqual({ status: 'ok', cycles: 0, lastCycleAt: null })
  })

  it('answers 500 when collecting the registry fails', async () => {
    const registry = new Registry()
    registry.metrics = async () => {
      throw new Error('collect failed')
    }
    const app = createMetricsApp(registry, () => ({ cycles: 0, lastCycleAt: null }))

    const res = await request(app).get('/metrics')

    expect(res.status).toBe(500)
    expect(res.body).toEqual({ error: 'Internal server error' })
  })
})
