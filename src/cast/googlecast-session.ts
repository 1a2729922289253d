/**
 * Google Cast session
 *
 * Holds one castv2 connection open to a receiver. The Default Media
 * Receiver is launched lazily on first play and reused afterwards. Media
 * status is tracked from the receiver's status events and refreshed on
 * demand. A periodic receiver status request keeps the device awake and
 * detects dropped connections.
 */

import castv2 from 'castv2-client'
import type { DefaultMediaReceiver, MediaInfo, MediaStatus as Castv2MediaStatus } from 'castv2-client'
import {
  ConnectionError,
  DeviceBusyError,
  PlaybackError,
  SpeakerError,
  errorMessage,
  isSameDevice,
  type Device,
} from '../types.js'
import { audioContentType } from '../utils/audio-format.js'
import { createLogger } from '../utils/logger.js'
import { abortReason, throwIfAborted } from '../utils/retry.js'
import { IDLE_STATUS, type CastSession, type MediaStatus } from './session.js'

const logger = createLogger({ module: 'googlecast-session' })

type Callback<T> = (err: Error | null, result: T) => void
type Unsubscribe = () => void

export type CastMediaInfo = MediaInfo
export type CastMediaStatus = Castv2MediaStatus

/** Media channel of a launched receiver app */
export interface MediaReceiver {
  load(media: CastMediaInfo, options: { autoplay?: boolean }, callback: Callback<CastMediaStatus>): void
  getStatus(callback: Callback<CastMediaStatus | undefined>): void
  stop(callback: Callback<CastMediaStatus | undefined>): void
  close(): void
  onStatus(listener: (status: CastMediaStatus) => void): Unsubscribe
}

/** Connection to a cast device */
export interface CastClient {
  connect(options: { host: string; port?: number }, callback: () => void): void
  launchMediaReceiver(callback: Callback<MediaReceiver>): void
  getReceiverStatus(callback: Callback<unknown>): void
  close(): void
  onError(listener: (error: Error) => void): Unsubscribe
  onClose(listener: () => void): Unsubscribe
}

function wrapReceiver(player: DefaultMediaReceiver): MediaReceiver {
  return {
    load: (media, options, callback) => player.load(media, options, callback),
    getStatus: (callback) => player.getStatus(callback),
    stop: (callback) => player.stop(callback),
    close: () => player.close(),
    onStatus(listener) {
      player.on('status', listener)
      return () => player.off('status', listener)
    },
  }
}

export function createCastv2Client(): CastClient {
  const client = new castv2.Client()
  return {
    connect: (options, callback) => client.connect(options, callback),
    launchMediaReceiver(callback) {
      client.launch(castv2.DefaultMediaReceiver, (err, player) => {
        callback(err, wrapReceiver(player))
      })
    },
    getReceiverStatus: (callback) => client.getStatus(callback),
    close: () => client.close(),
    onError(listener) {
      client.on('error', listener)
      return () => client.off('error', listener)
    },
    onClose(listener) {
      client.on('close', listener)
      return () => client.off('close', listener)
    },
  }
}

/**
 * Adapt a node-style callback call to a promise that rejects early when
 * signal aborts
 */
function invoke<T>(call: (callback: Callback<T>) => void, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = () => reject(abortReason(signal))
    signal?.addEventListener('abort', onAbort, { once: true })

    call((err, result) => {
      signal?.removeEventListener('abort', onAbort)
      if (err) {
        reject(err)
      } else {
        resolve(result)
      }
    })
  })
}

export function toMediaStatus(status: CastMediaStatus): MediaStatus {
  const base = {
    currentTime: status.currentTime,
    duration: status.media?.duration,
  }

  switch (status.playerState) {
    case 'PLAYING':
      return { ...base, state: 'playing' }
    case 'PAUSED':
      return { ...base, state: 'paused' }
    case 'BUFFERING':
      return { ...base, state: 'buffering' }
    case 'IDLE':
      return status.idleReason === 'ERROR'
        ? { ...base, state: 'error', idleReason: 'ERROR' }
        : { ...base, state: 'idle', idleReason: status.idleReason }
  }
}

export interface GoogleCastSessionOptions {
  createClient?: () => CastClient
  /** Resolve an address for devices stored without one */
  locate?: (device: Device, signal?: AbortSignal) => Promise<string | null>
  keepAliveIntervalMs?: number
  port?: number
}

export class GoogleCastSession implements CastSession {
  readonly deviceType = 'googlecast'
  readonly requiresAudioServer = true

  private client: CastClient | null = null
  private receiver: MediaReceiver | null = null
  private connectedDevice: Device | null = null
  private lastStatus: MediaStatus = IDLE_STATUS
  private keepAliveTimer: NodeJS.Timeout | null = null
  private subscriptions: Unsubscribe[] = []
  private receiverSubscription: Unsubscribe | null = null
  private pendingConnect: { device: Device; promise: Promise<void> } | null = null

  private createClient: () => CastClient
  private keepAliveIntervalMs: number

  constructor(private options: GoogleCastSessionOptions = {}) {
    this.createClient = options.createClient ?? createCastv2Client
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? 25_000
  }

  get device(): Device | null {
    return this.connectedDevice
  }

  isConnected(device?: Device): boolean {
    if (!this.client || !this.connectedDevice) {
      return false
    }
    return device ? isSameDevice(this.connectedDevice, device) : true
  }

  async connect(device: Device, signal?: AbortSignal): Promise<void> {
    if (this.isConnected(device)) {
      logger.debug({ deviceId: device.id }, 'Already connected')
      return
    }
    if (this.pendingConnect && isSameDevice(this.pendingConnect.device, device)) {
      return this.pendingConnect.promise
    }
    if (this.client) {
      await this.disconnect()
    }
    throwIfAborted(signal)

    const promise = this.establish(device, signal)
    this.pendingConnect = { device, promise }
    try {
      await promise
    } finally {
      if (this.pendingConnect?.promise === promise) {
        this.pendingConnect = null
      }
    }
  }

  async play(url: string, signal?: AbortSignal): Promise<void> {
    if (!this.client || !this.connectedDevice) {
      throw new PlaybackError('No active connection')
    }

    const receiver = await this.ensureReceiver(signal)
    const media: CastMediaInfo = {
      contentId: url,
      contentType: audioContentType(url, 'audio/mpeg'),
      streamType: 'BUFFERED',
      metadata: { type: 0, metadataType: 0, title: 'Voice message' },
    }

    logger.info({ url, contentType: media.contentType }, 'Sending load command')
    this.lastStatus = { state: 'buffering' }

    try {
      const status = await invoke<CastMediaStatus>((cb) => receiver.load(media, { autoplay: true }, cb), signal)
      this.lastStatus = toMediaStatus(status)
    } catch (error) {
      if (signal?.aborted) {
        throw error
      }
      this.lastStatus = IDLE_STATUS
      const message = errorMessage(error)
      if (/cancel|interrupt|busy/i.test(message)) {
        throw new DeviceBusyError(`Device refused playback: ${message}`, error)
      }
      throw new PlaybackError(`Load failed: ${message}`, error)
    }
  }

  status(): MediaStatus {
    return this.lastStatus
  }

  async refreshStatus(signal?: AbortSignal): Promise<MediaStatus> {
    const receiver = this.receiver
    if (!receiver) {
      return this.lastStatus
    }
    try {
      const status = await invoke<CastMediaStatus | undefined>((cb) => receiver.getStatus(cb), signal)
      if (status) {
        this.lastStatus = toMediaStatus(status)
      }
    } catch (error) {
      if (signal?.aborted) {
        throw error
      }
      logger.debug({ error: errorMessage(error) }, 'Status refresh failed, using last known status')
    }
    return this.lastStatus
  }

  async stop(): Promise<void> {
    const receiver = this.receiver
    if (!receiver) {
      return
    }
    try {
      await invoke<CastMediaStatus | undefined>((cb) => receiver.stop(cb))
      logger.info('Stopped cast media')
    } catch (error) {
      // No media session is the common case here
      logger.debug({ error: errorMessage(error) }, 'Stop command rejected')
    }
    this.lastStatus = { state: 'idle', idleReason: 'CANCELLED' }
  }

  async disconnect(): Promise<void> {
    const client = this.client
    const deviceId = this.connectedDevice?.id
    this.teardown()
    if (client) {
      client.close()
      logger.info({ deviceId }, 'Disconnected from cast device')
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async establish(device: Device, signal?: AbortSignal): Promise<void> {
    const host = device.address ?? (await this.options.locate?.(device, signal)) ?? null
    if (!host) {
      throw new ConnectionError(`No network address known for ${device.name}`)
    }

    try {
      await this.connectTo(device, host, signal)
    } catch (error) {
      // The stored address may be stale (DHCP); look the device up by id once
      if (signal?.aborted || !device.address || !this.options.locate) {
        throw error
      }
      const located = await this.options.locate(device, signal)
      if (!located || located === host) {
        throw error
      }
      logger.info({ deviceId: device.id, oldHost: host, newHost: located }, 'Device moved, retrying at new address')
      await this.connectTo(device, located, signal)
    }
  }

  private async connectTo(device: Device, host: string, signal?: AbortSignal): Promise<void> {
    logger.info({ deviceId: device.id, name: device.name, host }, 'Connecting to cast device')

    const client = this.createClient()
    try {
      await this.open(client, host, signal)
      // Handshake: the receiver must answer a status request before we call it connected
      await invoke<unknown>((cb) => client.getReceiverStatus(cb), signal)
    } catch (error) {
      client.close()
      if (error instanceof SpeakerError || signal?.aborted) {
        throw error
      }
      throw new ConnectionError(`Could not connect to ${device.name}: ${errorMessage(error)}`, error)
    }

    this.client = client
    this.connectedDevice = device
    this.lastStatus = IDLE_STATUS
    this.subscriptions = [
      client.onError((error) => {
        logger.warn({ error: error.message, deviceId: device.id }, 'Cast connection error')
        this.handleConnectionLost(client)
      }),
      client.onClose(() => this.handleConnectionLost(client)),
    ]
    this.startKeepAlive(client)

    logger.info({ deviceId: device.id, name: device.name }, 'Connected to cast device')
  }

  private open(client: CastClient, host: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        cleanup()
        reject(abortReason(signal))
      }
      const unsubscribeError = client.onError((error) => {
        cleanup()
        reject(new ConnectionError(`Connection to ${host} failed: ${error.message}`, error))
      })
      const cleanup = () => {
        unsubscribeError()
        signal?.removeEventListener('abort', onAbort)
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      client.connect({ host, port: this.options.port }, () => {
        cleanup()
        resolve()
      })
    })
  }

  private async ensureReceiver(signal?: AbortSignal): Promise<MediaReceiver> {
    if (this.receiver) {
      return this.receiver
    }
    const client = this.client
    if (!client) {
      throw new PlaybackError('No active connection')
    }

    let receiver: MediaReceiver
    try {
      receiver = await invoke<MediaReceiver>((cb) => client.launchMediaReceiver(cb), signal)
    } catch (error) {
      if (signal?.aborted) {
        throw error
      }
      throw new PlaybackError(`Could not launch media receiver: ${errorMessage(error)}`, error)
    }

    if (this.client !== client) {
      receiver.close()
      throw new PlaybackError('Connection lost while launching receiver')
    }

    this.receiver = receiver
    this.receiverSubscription = receiver.onStatus((status) => {
      if (this.receiver === receiver) {
        this.lastStatus = toMediaStatus(status)
      }
    })
    logger.debug('Media receiver launched')
    return receiver
  }

  private startKeepAlive(client: CastClient): void {
    this.stopKeepAlive()
    this.keepAliveTimer = setInterval(() => {
      client.getReceiverStatus((err) => {
        if (err) {
          logger.warn({ error: err.message }, 'Keep-alive failed')
          this.handleConnectionLost(client)
        }
      })
    }, this.keepAliveIntervalMs)
    this.keepAliveTimer.unref()
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer)
      this.keepAliveTimer = null
    }
  }

  private handleConnectionLost(client: CastClient): void {
    if (this.client !== client) {
      return
    }
    // Any media session short of a finished one counts, paused included
    const hadMedia = this.receiver !== null && this.lastStatus.idleReason !== 'FINISHED'
    logger.warn({ deviceId: this.connectedDevice?.id, hadMedia, state: this.lastStatus.state }, 'Cast connection lost')
    this.teardown()
    client.close()
    if (hadMedia) {
      this.lastStatus = { state: 'error', idleReason: 'ERROR' }
    }
  }

  private teardown(): void {
    this.stopKeepAlive()
    for (const unsubscribe of this.subscriptions) {
      unsubscribe()
    }
    this.subscriptions = []
    this.receiverSubscription?.()
    this.receiverSubscription = null
    this.receiver?.close()
    this.receiver = null
    this.client = null
    this.connectedDevice = null
    this.lastStatus = IDLE_STATUS
  }
}
