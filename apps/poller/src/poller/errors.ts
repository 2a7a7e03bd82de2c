/**
 * Poll Error Classification
 *
 * Every failure a collector, the normalizer or the sink can hit is reduced to
 * one PollErrorKind so logs and outcomes stay comparable across protocols.
 */

import type { PollErrorKind } from './types.js'

export class PollError extends Error {
  readonly kind: PollErrorKind
  readonly details?: Record<string, unknown>

  constructor(kind: PollErrorKind, message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'PollError'
    this.kind = kind
    this.details = options?.details
  }
}

export function connectivityTimeout(message: string, details?: Record<string, unknown>, cause?: unknown): PollError {
  return new PollError('ConnectivityTimeout', message, { details, cause })
}

export function protocolError(message: string, details?: Record<string, unknown>, cause?: unknown): PollError {
  return new PollError('ProtocolError', message, { details, cause })
}

export function structureError(message: string, details?: Record<string, unknown>): PollError {
  return new PollError('StructureError', message, { details })
}

export function configurationError(message: string, details?: Record<string, unknown>): PollError {
  return new PollError('ConfigurationError', message, { details })
}

// Node.js socket error codes meaning the device could not be reached
const UNREACHABLE_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'EAI_AGAIN',
]

// Error names raised by the browser driver and the SNMP library
const TIMEOUT_NAMES = ['TimeoutError', 'RequestTimedOutError']
const PROTOCOL_NAMES = ['ResponseInvalidError', 'RequestFailedError', 'RequestInvalidError']

/**
 * Reduce any thrown value to a PollError.
 *
 * Unknown failures are reported as ProtocolError with `unexpected: true` so
 * the device is skipped for this cycle instead of crashing the process.
 */
export function classifyPollError(error: unknown): PollError {
  if (error instanceof PollError) {
    return error
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined

    if (TIMEOUT_NAMES.includes(error.name)) {
      return connectivityTimeout(error.message, { errorName: error.name }, error)
    }

    if (code && UNREACHABLE_CODES.includes(code)) {
      return connectivityTimeout(`Network error: ${code}`, { errorCode: code }, error)
    }

    // Chromium reports navigation failures as net::ERR_* in the message
    if (/net::ERR_(CONNECTION|NAME|ADDRESS|INTERNET|TIMED_OUT|NETWORK)/.test(error.message)) {
      return connectivityTimeout(error.message, { errorName: error.name }, error)
    }

    if (PROTOCOL_NAMES.includes(error.name)) {
      return protocolError(error.message, { errorName: error.name }, error)
    }

    const lower = error.message.toLowerCase()
    if (lower.includes('timeout') || lower.includes('timed out')) {
      return connectivityTimeout(error.message, { errorName: error.name }, error)
    }

    return protocolError(error.message || 'Unexpected error', { errorName: error.name, unexpected: true }, error)
  }

  return protocolError(String(error), { unexpected: true })
}
