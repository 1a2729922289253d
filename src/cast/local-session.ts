/**
 * Local playback session
 *
 * Plays a file through a local player process (afplay on macOS). The
 * process exit is the completion signal: exit code 0 is FINISHED, a kill
 * from stop() is CANCELLED, anything else is ERROR.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'child_process'
import type { PlayerCommand } from '../config/app-config.js'
import { DeviceBusyError, PlaybackError, isSameDevice, type Device } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { throwIfAborted } from '../utils/retry.js'
import { IDLE_STATUS, type CastSession, type MediaStatus } from './session.js'

const logger = createLogger({ module: 'local-session' })

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess

export interface LocalSessionOptions {
  player: PlayerCommand
  spawn?: SpawnFn
}

export class LocalSession implements CastSession {
  readonly deviceType = 'macos_say'
  readonly requiresAudioServer = false

  private connectedDevice: Device | null = null
  private process: ChildProcess | null = null
  private lastStatus: MediaStatus = IDLE_STATUS
  private stopping = false
  private spawnFn: SpawnFn

  private static readonly STOP_GRACE_MS = 2_000

  constructor(private options: LocalSessionOptions) {
    this.spawnFn = options.spawn ?? spawn
  }

  get device(): Device | null {
    return this.connectedDevice
  }

  async connect(device: Device): Promise<void> {
    if (isSameDevice(this.connectedDevice, device)) {
      return
    }
    if (this.connectedDevice) {
      await this.disconnect()
    }
    this.connectedDevice = device
    logger.debug({ deviceId: device.id }, 'Local output ready')
  }

  isConnected(device?: Device): boolean {
    if (!this.connectedDevice) {
      return false
    }
    return device ? isSameDevice(this.connectedDevice, device) : true
  }

  async play(filePath: string, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal)

    if (!this.connectedDevice) {
      throw new PlaybackError('No active connection')
    }
    if (this.process) {
      throw new DeviceBusyError('Local player is already playing')
    }

    const { command, args } = this.options.player
    logger.info({ command, filePath }, 'Starting local player')

    const child = this.spawnFn(command, [...args, filePath], { stdio: 'ignore' })
    this.process = child
    this.stopping = false
    this.lastStatus = { state: 'playing' }

    child.once('error', (error) => {
      logger.error({ error, command }, 'Local player failed to start')
      if (this.process === child) {
        this.process = null
        this.lastStatus = { state: 'error', idleReason: 'ERROR' }
      }
    })

    child.once('exit', (code, exitSignal) => {
      if (this.process !== child) {
        return
      }
      this.process = null
      if (this.stopping) {
        this.lastStatus = { state: 'idle', idleReason: 'CANCELLED' }
      } else if (code === 0) {
        this.lastStatus = { state: 'idle', idleReason: 'FINISHED' }
      } else {
        logger.warn({ code, signal: exitSignal }, 'Local player exited abnormally')
        this.lastStatus = { state: 'error', idleReason: 'ERROR' }
      }
    })
  }

  status(): MediaStatus {
    return this.lastStatus
  }

  async refreshStatus(): Promise<MediaStatus> {
    return this.lastStatus
  }

  async stop(): Promise<void> {
    const child = this.process
    if (!child) {
      return
    }
    this.stopping = true

    const exited = new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn('Local player ignored SIGTERM, killing')
        child.kill('SIGKILL')
        resolve()
      }, LocalSession.STOP_GRACE_MS)
      child.once('exit', () => {
        clearTimeout(timer)
        resolve()
      })
    })

    child.kill('SIGTERM')
    await exited

    if (this.process === child) {
      this.process = null
      this.lastStatus = { state: 'idle', idleReason: 'CANCELLED' }
    }
    logger.info('Stopped local player')
  }

  async disconnect(): Promise<void> {
    await this.stop()
    this.connectedDevice = null
  }
}
