import { connectivityTimeout } from '../errors.js'

/**
 * Settle with `work`, or reject with a ConnectivityTimeout after `ms`.
 *
 * The timer is cleared on every path. `work` is not cancelled; callers
 * release its resources in their own `finally`.
 */
export async function withDeadline<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(connectivityTimeout(`${label} exceeded ${ms}ms`, { deadlineMs: ms }))
    }, ms)
  })

  try {
    return await Promise.race([work, expired])
  } finally {
    clearTimeout(timer)
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
