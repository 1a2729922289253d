/**
 * Timing helpers: sleeps, abort plumbing, Discord retry
 */

import { CancelledError } from '../types.js'
import { logger } from './logger.js'

/**
 * Sleep for ms. Rejects with CancelledError as soon as signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      reject(abortReason(signal))
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal)
  }
}

/**
 * Error to surface for an aborted signal. Errors given as the abort reason
 * (e.g. the timeout error set by withTimeout) pass through unchanged; a
 * plain abort() becomes CancelledError.
 */
export function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason
  if (reason instanceof Error && reason.name !== 'AbortError') {
    return reason
  }
  return new CancelledError('Operation cancelled')
}

/**
 * Run an abortable operation with a deadline.
 *
 * The operation gets a signal that aborts when either the parent signal aborts
 * or the deadline passes. On deadline the promise rejects with onTimeout().
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  throwIfAborted(parent)

  const controller = new AbortController()
  const forwardAbort = () => controller.abort(parent?.reason)
  parent?.addEventListener('abort', forwardAbort, { once: true })

  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout()
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), { once: true })
  })

  try {
    return await Promise.race([operation(controller.signal), deadline, aborted])
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener('abort', forwardAbort)
  }
}

/**
 * Retry a Discord API call with exponential backoff.
 * Gives up on 4xx errors other than 429.
 */
export async function retryDiscord<T>(
  fn: () => Promise<T>,
  maxBackoffMs: number,
  maxAttempts = 5
): Promise<T> {
  let attempt = 0
  let delay = Math.min(500, maxBackoffMs)

  for (;;) {
    try {
      return await fn()
    } catch (error) {
      attempt++
      const status = readStatus(error)
      const retryable = status === undefined || status === 429 || status >= 500
      if (!retryable || attempt >= maxAttempts) {
        throw error
      }

      logger.warn({ attempt, status, delayMs: delay }, 'Discord call failed, retrying')
      await sleep(delay)
      delay = Math.min(delay * 2, maxBackoffMs)
    }
  }
}

function readStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status
  }
  return undefined
}
