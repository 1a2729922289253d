/**
 * Cast Session
 *
 * Connection lifecycle to one playback device. Cast receivers pull audio
 * over HTTP; local playback reads the file directly and never needs the
 * audio server.
 */

import type { Device, DeviceType } from '../types.js'

export type TransportState = 'idle' | 'buffering' | 'playing' | 'paused' | 'error'

/** Why the transport went idle (Cast media channel semantics) */
export type IdleReason = 'FINISHED' | 'CANCELLED' | 'INTERRUPTED' | 'ERROR'

export interface MediaStatus {
  state: TransportState
  idleReason?: IdleReason
  currentTime?: number  // seconds
  duration?: number     // seconds
}

export const IDLE_STATUS: MediaStatus = { state: 'idle' }

export interface CastSession {
  readonly deviceType: DeviceType
  /** false for local playback: play() takes a file path, not a URL */
  readonly requiresAudioServer: boolean
  readonly device: Device | null

  /**
   * Connect to device. No-op when already connected to it; tears down any
   * connection to a different device first.
   */
  connect(device: Device, signal?: AbortSignal): Promise<void>

  isConnected(device?: Device): boolean

  /** Begin playback of a URL (cast) or file path (local) */
  play(source: string, signal?: AbortSignal): Promise<void>

  /** Last known transport status */
  status(): MediaStatus

  /** Ask the device for a fresh status; falls back to the last known one */
  refreshStatus(signal?: AbortSignal): Promise<MediaStatus>

  /** Stop current media. Safe when nothing is playing. */
  stop(): Promise<void>

  /** Release the connection. Always safe to call. */
  disconnect(): Promise<void>
}

/**
 * Playback progress in [0, 1], when the device reports a duration
 */
export function progressOf(status: MediaStatus): number | undefined {
  if (status.currentTime === undefined || !status.duration || status.duration <= 0) {
    return undefined
  }
  return Math.min(1, Math.max(0, status.currentTime / status.duration))
}
