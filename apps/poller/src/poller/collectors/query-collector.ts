/**
 * Query Collector
 *
 * Reads a profile's fixed object list from a device with one SNMP v2c GET.
 * Objects the agent has no value for are skipped; any transport or protocol
 * failure discards the whole response.
 */

import snmp from 'net-snmp'
import { classifyPollError, protocolError } from '../errors.js'
import { withDeadline } from '../utils/deadline.js'
import type { CollectContext, CollectResult, Collector, NamedReading, RawValue } from '../types.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Session surface
// ═══════════════════════════════════════════════════════════════════════════════

export interface QueryVarbind {
  oid: string
  type?: number
  value?: unknown
}

/**
 * The subset of a net-snmp Session used here; tests supply in-process fakes.
 */
export interface QuerySession {
  get(oids: string[], callback: (error: Error | null, varbinds?: QueryVarbind[]) => void): void
  on(event: 'error', listener: (error: Error) => void): unknown
  close(): void
}

export interface QuerySessionOptions {
  port: number
  community: string
  timeoutMs: number
  retries: number
}

export type QuerySessionFactory = (host: string, options: QuerySessionOptions) => QuerySession

export const openSnmpSession: QuerySessionFactory = (host, options) =>
  snmp.createSession(host, options.community, {
    port: options.port,
    retries: options.retries,
    timeout: options.timeoutMs,
    version: snmp.Version2c,
  })

// SNMPv2 exception types: noSuchObject, noSuchInstance, endOfMibView
const ABSENT_VALUE_TYPES = new Set([128, 129, 130])

// net-snmp hands Counter64 back as the raw big-endian octets
const COUNTER64_TYPE = 70

export const DEFAULT_SNMP_PORT = 161

// ═══════════════════════════════════════════════════════════════════════════════
// Options
// ═══════════════════════════════════════════════════════════════════════════════

export interface QueryObject {
  name: string
  oid: string
}

export interface QueryCollectorOptions {
  /** Objects to request, in request order */
  objects: readonly QueryObject[]

  /** Community string (default: 'public') */
  community?: string

  /** Per-request timeout in ms (default: 5000) */
  timeoutMs?: number

  /** Retries after the first request (default: 1) */
  retries?: number

  /** Slack before the watchdog fires (default: 2000) */
  watchdogGraceMs?: number

  /** Session factory (default: net-snmp) */
  openSession?: QuerySessionFactory
}

export const DEFAULT_QUERY_OPTIONS = {
  community: 'public',
  timeoutMs: 5_000,
  retries: 1,
  watchdogGraceMs: 2_000,
} as const

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

export function splitHostPort(address: string, defaultPort = DEFAULT_SNMP_PORT): { host: string; port: number } {
  const match = /^([^:]+):(\d{1,5})$/.exec(address)
  if (!match) {
    return { host: address, port: defaultPort }
  }
  return { host: match[1], port: Number.parseInt(match[2], 10) }
}

function readUnsigned(octets: Uint8Array): bigint {
  return octets.reduce((total, octet) => (total << 8n) | BigInt(octet), 0n)
}

function toRawValue(varbind: QueryVarbind): RawValue | undefined {
  const { value } = varbind
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'bigint') {
    return value
  }
  if (Buffer.isBuffer(value)) {
    return varbind.type === COUNTER64_TYPE ? readUnsigned(value) : value
  }
  return undefined
}

function isAbsent(varbind: QueryVarbind): boolean {
  if (varbind.value === null || varbind.value === undefined) return true
  return varbind.type !== undefined && ABSENT_VALUE_TYPES.has(varbind.type)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Collector
// ═══════════════════════════════════════════════════════════════════════════════

export class QueryCollector implements Collector {
  readonly protocol = 'query' as const

  private readonly objects: readonly QueryObject[]
  private readonly sessionOptions: Omit<QuerySessionOptions, 'port'>
  private readonly openSession: QuerySessionFactory
  private readonly watchdogMs: number

  constructor(options: QueryCollectorOptions) {
    this.objects = options.objects
    this.sessionOptions = {
      community: options.community ?? DEFAULT_QUERY_OPTIONS.community,
      timeoutMs: options.timeoutMs ?? DEFAULT_QUERY_OPTIONS.timeoutMs,
      retries: options.retries ?? DEFAULT_QUERY_OPTIONS.retries,
    }
    this.openSession = options.openSession ?? openSnmpSession
    this.watchdogMs =
      this.sessionOptions.timeoutMs * (this.sessionOptions.retries + 1) +
      (options.watchdogGraceMs ?? DEFAULT_QUERY_OPTIONS.watchdogGraceMs)
  }

  async collect(address: string, site: string, ctx: CollectContext): Promise<CollectResult> {
    const log = ctx.logger
    const { host, port } = splitHostPort(address)
    let session: QuerySession | null = null

    try {
      session = this.openSession(host, { ...this.sessionOptions, port })
      session.on('error', (error) => {
        log.warn('Query session error', { host, port }, error)
      })

      const varbinds = await withDeadline(
        this.request(session),
        this.watchdogMs,
        `Query of ${site}/${ctx.deviceId}`
      )
      const entries = this.pair(varbinds, log)
      log.debug('Objects read', { requested: this.objects.length, returned: entries.length })
      return { ok: true, fields: { layout: 'named', entries } }
    } catch (error) {
      return { ok: false, error: classifyPollError(error) }
    } finally {
      if (session) {
        try {
          session.close()
        } catch (error) {
          log.warn('Query session close failed', { host, port }, error)
        }
      }
    }
  }

  private request(session: QuerySession): Promise<QueryVarbind[]> {
    const oids = this.objects.map((object) => object.oid)
    return new Promise((resolve, reject) => {
      session.get(oids, (error, varbinds) => {
        if (error) {
          reject(error)
          return
        }
        resolve(varbinds ?? [])
      })
    })
  }

  /**
   * Pair each requested object with its varbind by position.
   * @throws PollError (ProtocolError) when the response does not line up with the request
   */
  private pair(varbinds: readonly QueryVarbind[], log: CollectContext['logger']): NamedReading[] {
    if (varbinds.length !== this.objects.length) {
      throw protocolError(`Response carried ${varbinds.length} values for ${this.objects.length} objects`, {
        requested: this.objects.length,
        returned: varbinds.length,
      })
    }

    const entries: NamedReading[] = []
    this.objects.forEach((object, index) => {
      const varbind = varbinds[index]
      if (varbind.oid !== object.oid) {
        throw protocolError(`Response object ${varbind.oid} does not match requested ${object.oid}`, {
          requested: object.oid,
          returned: varbind.oid,
        })
      }
      if (isAbsent(varbind)) {
        log.debug('Object has no value', { object: object.name, oid: object.oid })
        return
      }
      const value = toRawValue(varbind)
      if (value === undefined) {
        log.debug('Object value is not scalar', { object: object.name, oid: object.oid })
        return
      }
      entries.push({ name: object.name, value })
    })
    return entries
  }
}
