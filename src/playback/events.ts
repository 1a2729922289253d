/**
 * Playback progress events
 *
 * Events for one request are delivered through a ProgressChannel, which
 * awaits each callback before running the next and drops everything after
 * a terminal event or close().
 */

import type { MediaStatus, TransportState } from '../cast/session.js'
import { errorMessage, type Device, type ErrorKind } from '../types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger({ module: 'playback-events' })

export type PlaybackState =
  | 'idle'
  | 'preparing_audio'
  | 'awaiting_connection'
  | 'serving'
  | 'playing'
  | 'complete'
  | 'error'

export type PlaybackEvent =
  | { type: 'preparing'; requestId: string; device: Device }
  | { type: 'connecting'; requestId: string; device: Device }
  | { type: 'serving'; requestId: string; url: string }
  | {
      type: 'playing'
      requestId: string
      device: Device
      status: TransportState
      progress?: number  // 0..1 when the device reports a duration
      elapsedMs: number
    }
  | { type: 'complete'; requestId: string; device: Device; elapsedMs: number; caption?: string }
  | { type: 'error'; requestId: string; kind: ErrorKind; message: string }

export type ProgressCallback = (event: PlaybackEvent) => void | Promise<void>

export function isTerminalEvent(event: PlaybackEvent): boolean {
  return event.type === 'complete' || event.type === 'error'
}

export function describeStatus(status: MediaStatus): string {
  return status.idleReason ? `${status.state} (${status.idleReason})` : status.state
}

export class ProgressChannel {
  private queue: Promise<void> = Promise.resolve()
  private closed = false
  private finished = false

  constructor(private callback: ProgressCallback) {}

  get isOpen(): boolean {
    return !this.closed && !this.finished
  }

  /**
   * Queue event for delivery. Callback failures are logged; they never
   * reach the playback that emitted the event.
   */
  emit(event: PlaybackEvent): void {
    if (!this.isOpen) {
      logger.debug({ type: event.type, requestId: event.requestId }, 'Dropping event on settled channel')
      return
    }
    if (isTerminalEvent(event)) {
      this.finished = true
    }

    this.queue = this.queue.then(async () => {
      if (this.closed) {
        return
      }
      try {
        await this.callback(event)
      } catch (error) {
        logger.warn({ type: event.type, error: errorMessage(error) }, 'Progress callback failed')
      }
    })
  }

  /** Discard pending and future events (used on cancellation) */
  close(): void {
    this.closed = true
  }

  /** Resolves once every queued event has been delivered or dropped */
  drain(): Promise<void> {
    return this.queue
  }
}
