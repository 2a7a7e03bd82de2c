/**
 * Scrape Collector
 *
 * Renders a device's status page in headless Chromium and reads the two tile
 * blocks. Each block holds alternating label and value lines.
 *
 * One browser per attempt. The browser is closed before collect() settles on
 * every path, including the watchdog firing while the page is still loading.
 */

import { chromium } from 'playwright-core'
import type { ILogger } from '@fieldpoll/logger'
import { classifyPollError, protocolError, structureError } from '../errors.js'
import { withDeadline } from '../utils/deadline.js'
import { DEFAULT_TILE_SELECTOR } from '../profiles.js'
import type { CollectContext, CollectResult, Collector } from '../types.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Browser surface
// ═══════════════════════════════════════════════════════════════════════════════

// The subset of the playwright API used here. playwright's Browser satisfies
// it structurally; tests supply in-process fakes.

export interface TileLocator {
  nth(index: number): { waitFor(options: { state: 'visible'; timeout: number }): Promise<void> }
  allInnerTexts(): Promise<string[]>
}

export interface RenderedPage {
  goto(
    url: string,
    options: { timeout: number; waitUntil: 'domcontentloaded' }
  ): Promise<{ status(): number } | null>
  locator(selector: string): TileLocator
}

export interface BrowserSession {
  newPage(): Promise<RenderedPage>
  close(): Promise<void>
}

export type BrowserLauncher = () => Promise<BrowserSession>

export const launchHeadlessChromium: BrowserLauncher = () => chromium.launch({ headless: true })

// ═══════════════════════════════════════════════════════════════════════════════
// Options
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScrapeCollectorOptions {
  /** CSS selector shared by both tile blocks */
  selector?: string

  /** Browser factory (default: headless Chromium) */
  launch?: BrowserLauncher

  /** Navigation timeout in ms (default: 45000) */
  navigationTimeoutMs?: number

  /** Ceiling for the tile blocks to appear, in ms (default: 45000) */
  waitCeilingMs?: number

  /** Slack on top of navigation + wait before the watchdog fires (default: 5000) */
  watchdogGraceMs?: number

  /** Upper bound for closing the browser (default: 10000) */
  closeTimeoutMs?: number
}

export const DEFAULT_SCRAPE_OPTIONS = {
  navigationTimeoutMs: 45_000,
  waitCeilingMs: 45_000,
  watchdogGraceMs: 5_000,
  closeTimeoutMs: 10_000,
} as const

// ═══════════════════════════════════════════════════════════════════════════════
// Text helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Split a block's inner text into trimmed, non-blank lines.
 */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

/**
 * Concatenate the blocks and keep every second line starting at index 1.
 * Labels sit at even positions, values at odd ones.
 */
export function valueLines(blocks: readonly string[][]): string[] {
  return blocks.flat().filter((_line, index) => index % 2 === 1)
}

export function pageUrl(address: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(address) ? address : `http://${address}/`
}

// ═══════════════════════════════════════════════════════════════════════════════
// Collector
// ═══════════════════════════════════════════════════════════════════════════════

export class ScrapeCollector implements Collector {
  readonly protocol = 'scrape' as const

  private readonly selector: string
  private readonly launch: BrowserLauncher
  private readonly navigationTimeoutMs: number
  private readonly waitCeilingMs: number
  private readonly watchdogMs: number
  private readonly closeTimeoutMs: number

  constructor(options: ScrapeCollectorOptions = {}) {
    this.selector = options.selector ?? DEFAULT_TILE_SELECTOR
    this.launch = options.launch ?? launchHeadlessChromium
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? DEFAULT_SCRAPE_OPTIONS.navigationTimeoutMs
    this.waitCeilingMs = options.waitCeilingMs ?? DEFAULT_SCRAPE_OPTIONS.waitCeilingMs
    this.watchdogMs =
      this.navigationTimeoutMs +
      this.waitCeilingMs +
      (options.watchdogGraceMs ?? DEFAULT_SCRAPE_OPTIONS.watchdogGraceMs)
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_SCRAPE_OPTIONS.closeTimeoutMs
  }

  async collect(address: string, site: string, ctx: CollectContext): Promise<CollectResult> {
    const url = pageUrl(address)
    const log = ctx.logger
    const launching = Promise.resolve().then(() => this.launch())
    const lease: { session?: BrowserSession } = {}

    const render = async (): Promise<string[]> => {
      const session = await launching
      lease.session = session
      const page = await session.newPage()

      log.debug('Navigating', { url })
      const response = await page.goto(url, {
        timeout: this.navigationTimeoutMs,
        waitUntil: 'domcontentloaded',
      })
      const status = response?.status()
      if (status !== undefined && status >= 400) {
        throw protocolError(`Status page answered HTTP ${status}`, { statusCode: status })
      }

      const tiles = page.locator(this.selector)
      await tiles.nth(1).waitFor({ state: 'visible', timeout: this.waitCeilingMs })
      return tiles.allInnerTexts()
    }

    try {
      const texts = await withDeadline(render(), this.watchdogMs, `Scrape of ${site}/${ctx.deviceId}`)
      const blocks = this.toBlocks(texts)
      const values = valueLines(blocks)
      log.debug('Tiles read', { blocks: blocks.length, values: values.length })
      return { ok: true, fields: { layout: 'positional', values } }
    } catch (error) {
      return { ok: false, error: classifyPollError(error) }
    } finally {
      await this.release(lease.session, launching, log)
    }
  }

  private toBlocks(texts: readonly string[]): string[][] {
    if (texts.length < 2) {
      throw structureError(`Expected 2 '${this.selector}' blocks, found ${texts.length}`, {
        selector: this.selector,
        found: texts.length,
      })
    }
    const blocks = texts.slice(0, 2).map(splitLines)
    blocks.forEach((lines, index) => {
      if (lines.length === 0) {
        throw structureError(`Tile block ${index} has no text`, { selector: this.selector, block: index })
      }
    })
    return blocks
  }

  private async release(
    session: BrowserSession | undefined,
    launching: Promise<BrowserSession>,
    log: ILogger
  ): Promise<void> {
    if (session) {
      await this.close(session, log)
      return
    }

    // The watchdog fired before the browser came up; close it once it does.
    void launching.then(
      (late) => this.close(late, log),
      (error: unknown) => log.debug('Browser launch failed', { reason: classifyPollError(error).message })
    )
  }

  private async close(session: BrowserSession, log: ILogger): Promise<void> {
    try {
      await withDeadline(session.close(), this.closeTimeoutMs, 'Browser close')
    } catch (error) {
      log.warn('BROWSER_CLOSE_FAILED', { event_name: 'BROWSER_CLOSE_FAILED' }, error)
    }
  }
}
