import { describe, it, expect } from 'vitest'
import { createDeviceLogger, eventMeta } from '../structured-log.js'
import { createTestLogger } from '../../poller/__tests__/test-logger.js'

describe('createDeviceLogger', () => {
  it('passes the device envelope without empty fields', () => {
    const base = createTestLogger()

    createDeviceLogger(base, {
      siteId: 'Pine',
      deviceId: 'Solar',
      kind: 'charge-controller',
      cycle: 4,
      address: undefined,
    })

    expect(base.child).toHaveBeenCalledWith({
      siteId: 'Pine',
      deviceId: 'Solar',
      kind: 'charge-controller',
      cycle: 4,
    })
  })
})

describe('eventMeta', () => {
  it('puts the event name first and drops null values', () => {
    expect(eventMeta('DEVICE_POLL_FAILED', { errorKind: 'ProtocolError', statusCode: null })).toEqual({
      event_name: 'DEVICE_POLL_FAILED',
      errorKind: 'ProtocolError',
    })
  })
})
