import { describe, it, expect, vi } from 'vitest'
import {
  ScrapeCollector,
  pageUrl,
  splitLines,
  valueLines,
  type BrowserSession,
  type RenderedPage,
  type TileLocator,
} from '../scrape-collector.js'
import { createTestLogger } from '../../__tests__/test-logger.js'

interface FakeBrowserOptions {
  texts?: string[]
  status?: number
  gotoError?: Error
  waitError?: Error
  hangOnWait?: boolean
  closeError?: Error
}

function fakeBrowser(options: FakeBrowserOptions = {}) {
  const waitFor = vi.fn(async () => {
    if (options.hangOnWait) {
      await new Promise<void>(() => {})
    }
    if (options.waitError) throw options.waitError
  })
  const locator: TileLocator = {
    nth: vi.fn(() => ({ waitFor })),
    allInnerTexts: vi.fn(async () => options.texts ?? []),
  }
  const goto = vi.fn(async () => {
    if (options.gotoError) throw options.gotoError
    return { status: () => options.status ?? 200 }
  })
  const locate = vi.fn(() => locator)
  const page: RenderedPage = { goto, locator: locate }
  const close = vi.fn(async () => {
    if (options.closeError) throw options.closeError
  })
  const session: BrowserSession = { newPage: vi.fn(async () => page), close }
  const launch = vi.fn(async () => session)
  return { launch, goto, locate, locator, waitFor, close }
}

function context() {
  const logger = createTestLogger()
  return { ctx: { deviceId: 'Solar', logger }, logger }
}

const TILES = ['array current\n84 V', 'array voltage\n12.1 V']

describe('text helpers', () => {
  it('splitLines trims and drops blank lines', () => {
    expect(splitLines('  array current \r\n\n 84 V\n')).toEqual(['array current', '84 V'])
  })

  it('valueLines keeps odd positions across both blocks', () => {
    expect(
      valueLines([
        ['array current', '84 V', 'array voltage', '12.1 V'],
        ['battery voltage', '26.4 V'],
      ])
    ).toEqual(['84 V', '12.1 V', '26.4 V'])
  })

  it('pageUrl adds a scheme only when missing', () => {
    expect(pageUrl('10.0.0.5')).toBe('http://10.0.0.5/')
    expect(pageUrl('10.0.0.5:8080')).toBe('http://10.0.0.5:8080/')
    expect(pageUrl('https://controller.local/status')).toBe('https://controller.local/status')
  })
})

describe('ScrapeCollector', () => {
  it('returns the value lines of both tile blocks', async () => {
    const browser = fakeBrowser({ texts: TILES })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result).toEqual({ ok: true, fields: { layout: 'positional', values: ['84 V', '12.1 V'] } })
    expect(browser.goto).toHaveBeenCalledWith('http://10.0.0.5/', {
      timeout: 45_000,
      waitUntil: 'domcontentloaded',
    })
    expect(browser.locate).toHaveBeenCalledWith('.tile')
    expect(browser.locator.nth).toHaveBeenCalledWith(1)
    expect(browser.waitFor).toHaveBeenCalledWith({ state: 'visible', timeout: 45_000 })
    expect(browser.close).toHaveBeenCalledTimes(1)
  })

  it('uses the profile selector and configured ceilings', async () => {
    const browser = fakeBrowser({ texts: TILES })
    const collector = new ScrapeCollector({
      launch: browser.launch,
      selector: '.panel',
      navigationTimeoutMs: 20_000,
      waitCeilingMs: 30_000,
    })
    const { ctx } = context()

    await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(browser.locate).toHaveBeenCalledWith('.panel')
    expect(browser.goto).toHaveBeenCalledWith('http://10.0.0.5/', {
      timeout: 20_000,
      waitUntil: 'domcontentloaded',
    })
    expect(browser.waitFor).toHaveBeenCalledWith({ state: 'visible', timeout: 30_000 })
  })

  it('ignores blocks after the second', async () => {
    const browser = fakeBrowser({ texts: [...TILES, 'firmware\n2.4.1'] })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result).toEqual({ ok: true, fields: { layout: 'positional', values: ['84 V', '12.1 V'] } })
  })

  it('reports a StructureError when a tile block is missing', async () => {
    const browser = fakeBrowser({ texts: ['array current\n84 V'] })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('StructureError')
    expect(result.error.message).toBe("Expected 2 '.tile' blocks, found 1")
    expect(browser.close).toHaveBeenCalledTimes(1)
  })

  it('reports a StructureError when a tile block is blank', async () => {
    const browser = fakeBrowser({ texts: ['array current\n84 V', ' \n '] })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('StructureError')
    expect(result.error.details).toEqual({ selector: '.tile', block: 1 })
  })

  it('classifies a wait timeout as ConnectivityTimeout and closes the browser', async () => {
    const timeout = new Error('locator.waitFor: Timeout 45000ms exceeded.')
    timeout.name = 'TimeoutError'
    const browser = fakeBrowser({ waitError: timeout })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('ConnectivityTimeout')
    expect(browser.close).toHaveBeenCalledTimes(1)
  })

  it('classifies a refused navigation as ConnectivityTimeout', async () => {
    const browser = fakeBrowser({
      gotoError: new Error('page.goto: net::ERR_CONNECTION_REFUSED at http://10.0.0.5/'),
    })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('ConnectivityTimeout')
    expect(browser.waitFor).not.toHaveBeenCalled()
    expect(browser.close).toHaveBeenCalledTimes(1)
  })

  it('reports an HTTP error status as ProtocolError', async () => {
    const browser = fakeBrowser({ status: 500, texts: TILES })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('ProtocolError')
    expect(result.error.details).toEqual({ statusCode: 500 })
    expect(browser.close).toHaveBeenCalledTimes(1)
  })

  it('settles through the watchdog when the page never renders', async () => {
    const browser = fakeBrowser({ hangOnWait: true })
    const collector = new ScrapeCollector({
      launch: browser.launch,
      navigationTimeoutMs: 10,
      waitCeilingMs: 10,
      watchdogGraceMs: 10,
    })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('ConnectivityTimeout')
    expect(result.error.message).toBe('Scrape of Pine/Solar exceeded 30ms')
    expect(browser.close).toHaveBeenCalledTimes(1)
  })

  it('closes a browser that comes up after the watchdog fired', async () => {
    const browser = fakeBrowser({ texts: TILES })
    const gate: { open?: () => void } = {}
    const slowLaunch = vi.fn(async () => {
      await new Promise<void>((resolve) => {
        gate.open = resolve
      })
      return browser.launch()
    })
    const collector = new ScrapeCollector({
      launch: slowLaunch,
      navigationTimeoutMs: 10,
      waitCeilingMs: 10,
      watchdogGraceMs: 10,
    })
    const { ctx } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    expect(browser.close).not.toHaveBeenCalled()

    gate.open?.()
    await vi.waitFor(() => expect(browser.close).toHaveBeenCalledTimes(1))
  })

  it('reports a launch failure without throwing', async () => {
    const launch = vi.fn((): Promise<BrowserSession> => {
      throw new Error("Executable doesn't exist at /opt/chromium/chrome")
    })
    const collector = new ScrapeCollector({ launch })
    const { ctx, logger } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('ProtocolError')
    expect(result.error.details).toEqual({ errorName: 'Error', unexpected: true })
    await vi.waitFor(() =>
      expect(logger.debug).toHaveBeenCalledWith('Browser launch failed', {
        reason: "Executable doesn't exist at /opt/chromium/chrome",
      })
    )
  })

  it('keeps the reading when closing the browser fails', async () => {
    const browser = fakeBrowser({ texts: TILES, closeError: new Error('Target closed') })
    const collector = new ScrapeCollector({ launch: browser.launch })
    const { ctx, logger } = context()

    const result = await collector.collect('10.0.0.5', 'Pine', ctx)

    expect(result.ok).toBe(true)
    expect(logger.warn).toHaveBeenCalledWith(
      'BROWSER_CLOSE_FAILED',
      { event_name: 'BROWSER_CLOSE_FAILED' },
      expect.any(Error)
    )
  })
})
