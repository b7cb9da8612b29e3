import type { ServerResponse } from 'node:http'
import { RequestAbortedError } from './errors'

/**
 * Throw the signal's reason if the request was cancelled.
 * Reasons set by the route are RequestAbortedError instances; anything else maps to a disconnect.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (!signal?.aborted) return
  throw abortReason(signal)
}

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new RequestAbortedError('client_disconnect')
}

/**
 * Sleep that ends early (rejecting) when the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      if (signal) reject(abortReason(signal))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Race a promise against a deadline and the request signal.
 * The underlying work is not interrupted; its late result is ignored.
 */
export function withDeadline<T>(
  work: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }

    const cleanup = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
    const onAbort = () => {
      cleanup()
      if (signal) reject(abortReason(signal))
    }
    const timer = setTimeout(() => {
      cleanup()
      reject(onTimeout())
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })

    work.then(
      (value) => {
        cleanup()
        resolve(value)
      },
      (error: unknown) => {
        cleanup()
        reject(error)
      }
    )
  })
}

export const REQUEST_TIMEOUT_MS = parseInt(process.env.REQUEST_TIMEOUT_MS || '10000', 10)

export interface RequestSignal {
  signal: AbortSignal
  dispose(): void
}

/**
 * Abort signal for one HTTP request: fires on the global request timeout or
 * when the client disconnects before the response is finished.
 */
export function createRequestSignal(res: ServerResponse, timeoutMs: number = REQUEST_TIMEOUT_MS): RequestSignal {
  const controller = new AbortController()

  const timer = setTimeout(() => {
    controller.abort(new RequestAbortedError('timeout'))
  }, timeoutMs)

  const onClose = () => {
    if (!res.writableFinished) {
      controller.abort(new RequestAbortedError('client_disconnect'))
    }
  }
  res.on('close', onClose)

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer)
      res.off('close', onClose)
    },
  }
}
