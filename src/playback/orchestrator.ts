/**
 * Playback Orchestrator
 *
 * Runs prepare -> connect -> serve -> play -> await completion as one
 * cancellable operation per chat session. Each session holds at most one
 * playback; a new request aborts the old one and waits for its cleanup
 * before it starts preparing audio.
 */

import { randomUUID } from 'crypto'
import { unlink } from 'fs/promises'
import type { CastSessionFactory } from '../cast/index.js'
import { progressOf, type CastSession, type MediaStatus } from '../cast/session.js'
import type { DeviceStore } from '../config/device-store.js'
import type { AudioPreparer } from '../tts/speech.js'
import {
  ConnectionError,
  PlaybackError,
  PrepError,
  SpeakerError,
  errorMessage,
  isSameDevice,
  type Device,
} from '../types.js'
import { createLogger, withSessionLogging } from '../utils/logger.js'
import { abortReason, sleep, throwIfAborted, withTimeout } from '../utils/retry.js'
import { ProgressChannel, describeStatus, type PlaybackState, type ProgressCallback } from './events.js'

const logger = createLogger({ module: 'orchestrator' })

// ============================================================================
// Types
// ============================================================================

/** Fetches inbound audio bytes (e.g. a chat attachment download) */
export type AudioLoader = (signal: AbortSignal) => Promise<Buffer>

export type PlaybackInput =
  | { kind: 'text'; text: string }
  | { kind: 'voice'; load: AudioLoader }
  | { kind: 'audio'; load: AudioLoader; extension: string }

export interface PlaybackRequest {
  readonly id: string
  readonly input: PlaybackInput
  readonly caption: string
  readonly device: Device | null
}

export type PlaybackOutcome =
  | { requestId: string; state: 'complete'; elapsedMs: number }
  | { requestId: string; state: 'error'; error: SpeakerError }
  | { requestId: string; state: 'cancelled' }

/** The part of AudioServer the orchestrator drives */
export interface AudioEndpoint {
  start(filePath: string): Promise<string>
  stop(): Promise<void>
}

export type ConnectResult = 'already_connected' | 'connected' | 'local'

export interface SessionStatus {
  device: Device | null
  connected: boolean
  state: PlaybackState
  /** Caption of the playback in flight */
  playing: string | null
  lastOutcome: PlaybackOutcome | null
}

export interface PlaybackOrchestratorOptions {
  preparer: AudioPreparer
  createCastSession: CastSessionFactory
  createAudioServer: () => AudioEndpoint
  deviceStore: DeviceStore
  connectTimeoutMs?: number
  pollIntervalMs?: number
  /** Idle with no reason this long after play() counts as finished */
  idleGraceMs?: number
  /** Sessions without activity for this long are dropped */
  sessionIdleMs?: number
  now?: () => number
}

export function captionOf(input: PlaybackInput): string {
  switch (input.kind) {
    case 'text':
      return input.text
    case 'voice':
      return 'Voice message'
    case 'audio':
      return `Audio file (${input.extension.replace(/^\./, '') || 'unknown'})`
  }
}

class ActivePlayback {
  readonly controller = new AbortController()
  state: PlaybackState = 'idle'
  settled: Promise<PlaybackOutcome> | null = null

  constructor(readonly request: PlaybackRequest, readonly channel: ProgressChannel) {}

  get signal(): AbortSignal {
    return this.controller.signal
  }

  cancel(): void {
    this.channel.close()
    this.controller.abort()
  }
}

class ChatSession {
  cast: CastSession | null = null
  server: AudioEndpoint | null = null
  active: ActivePlayback | null = null
  state: PlaybackState = 'idle'
  lastOutcome: PlaybackOutcome | null = null

  constructor(readonly chatId: string, public device: Device | null, public lastActivity: number) {}
}

// ============================================================================
// Orchestrator
// ============================================================================

export class PlaybackOrchestrator {
  private sessions = new Map<string, ChatSession>()
  private selectedDevice: Promise<Device | null> | null = null

  private connectTimeoutMs: number
  private pollIntervalMs: number
  private idleGraceMs: number
  private sessionIdleMs: number
  private now: () => number

  constructor(private options: PlaybackOrchestratorOptions) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000
    this.idleGraceMs = options.idleGraceMs ?? 5_000
    this.sessionIdleMs = options.sessionIdleMs ?? 6 * 60 * 60 * 1000
    this.now = options.now ?? Date.now
  }

  get sessionCount(): number {
    return this.sessions.size
  }

  /**
   * Play input on the chat's selected device. Resolves once the playback
   * has settled and, unless it was cancelled, every progress event has
   * been delivered.
   */
  async play(chatId: string, input: PlaybackInput, onProgress: ProgressCallback): Promise<PlaybackOutcome> {
    const { settled } = await this.begin(chatId, input, onProgress)
    return settled
  }

  /**
   * Like play(), but resolves as soon as the request is the session's active
   * playback, so a later cancel() is guaranteed to reach it.
   */
  async begin(
    chatId: string,
    input: PlaybackInput,
    onProgress: ProgressCallback
  ): Promise<{ requestId: string; settled: Promise<PlaybackOutcome> }> {
    const session = await this.lookup(chatId)
    const request: PlaybackRequest = {
      id: randomUUID().slice(0, 8),
      input,
      caption: captionOf(input),
      device: session.device,
    }

    const previous = session.active
    if (previous) {
      logger.info({ chatId, requestId: request.id, cancelled: previous.request.id }, 'Cancelling in-flight playback')
      previous.cancel()
    }

    const playback = new ActivePlayback(request, new ProgressChannel(onProgress))
    session.active = playback
    session.state = 'idle'
    const settled = this.run(session, playback, previous)
    playback.settled = settled
    return { requestId: request.id, settled }
  }

  async connect(chatId: string, signal?: AbortSignal): Promise<ConnectResult> {
    const session = await this.lookup(chatId)
    return withSessionLogging({ chatId }, async () => {
      const device = session.device
      if (!device) {
        throw new ConnectionError('No device selected. Use /setup to choose one.')
      }

      const cast = await this.castSessionFor(session, device)
      if (!cast.requiresAudioServer) {
        await cast.connect(device, signal)
        return 'local'
      }
      if (cast.isConnected(device)) {
        logger.info({ deviceId: device.id }, 'Connect requested while already connected')
        return 'already_connected'
      }

      await this.connectCast(cast, device, signal)
      return 'connected'
    })
  }

  /**
   * Persist device as the selection and make it this chat's target.
   * Playback or a connection bound to another device is dropped.
   */
  async selectDevice(chatId: string, device: Device): Promise<void> {
    const session = await this.lookup(chatId)
    await this.options.deviceStore.save(device)
    this.selectedDevice = Promise.resolve(device)
    session.device = device

    if (session.active && !isSameDevice(session.active.request.device, device)) {
      await this.cancelActive(session)
    }
    if (session.cast?.isConnected() && !session.cast.isConnected(device)) {
      await this.dropConnection(session)
    }

    logger.info({ chatId, deviceId: device.id, name: device.name, deviceType: device.deviceType }, 'Device selected')
  }

  async getStatus(chatId: string): Promise<SessionStatus> {
    const session = await this.lookup(chatId)
    return {
      device: session.device,
      connected: !!session.device && !!session.cast?.isConnected(session.device),
      state: session.state,
      playing: session.active?.request.caption ?? null,
      lastOutcome: session.lastOutcome,
    }
  }

  /** Cancel the chat's playback in flight. Returns false when there was none. */
  async cancel(chatId: string): Promise<boolean> {
    const session = this.sessions.get(chatId)
    if (!session?.active) {
      return false
    }
    await this.cancelActive(session)
    return true
  }

  async shutdown(): Promise<void> {
    const sessions = [...this.sessions.values()]
    this.sessions.clear()
    await Promise.all(sessions.map((session) => this.destroy(session)))
    logger.info({ sessions: sessions.length }, 'Orchestrator shut down')
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async lookup(chatId: string): Promise<ChatSession> {
    this.selectedDevice ??= this.options.deviceStore.load()
    const device = await this.selectedDevice
    await this.expireIdleSessions()

    let session = this.sessions.get(chatId)
    if (!session) {
      session = new ChatSession(chatId, device, this.now())
      this.sessions.set(chatId, session)
      logger.debug({ chatId, deviceId: device?.id }, 'Session created')
    }
    session.lastActivity = this.now()
    return session
  }

  private async expireIdleSessions(): Promise<void> {
    const cutoff = this.now() - this.sessionIdleMs
    const expired = [...this.sessions.values()].filter((s) => !s.active && s.lastActivity < cutoff)
    for (const session of expired) {
      this.sessions.delete(session.chatId)
      logger.info({ chatId: session.chatId }, 'Session expired')
      await this.destroy(session)
    }
  }

  private async destroy(session: ChatSession): Promise<void> {
    await this.cancelActive(session)
    await this.dropConnection(session)
    session.cast = null
  }

  private async cancelActive(session: ChatSession): Promise<void> {
    const active = session.active
    if (!active) {
      return
    }
    active.cancel()
    await active.settled
  }

  private run(session: ChatSession, playback: ActivePlayback, previous: ActivePlayback | null): Promise<PlaybackOutcome> {
    return withSessionLogging({ chatId: session.chatId, requestId: playback.request.id }, async () => {
      if (previous?.settled) {
        await previous.settled
      }

      const resources: { filePath: string | null } = { filePath: null }
      let outcome: PlaybackOutcome
      try {
        outcome = await this.execute(session, playback, resources)
      } catch (error) {
        outcome = await this.fail(session, playback, error)
      }

      await this.release(session, resources.filePath)
      // A cancelled channel is closed; its in-flight callback must not hold up the replacement
      if (!playback.signal.aborted) {
        await playback.channel.drain()
      }

      if (outcome.state !== 'cancelled') {
        session.lastOutcome = outcome
      }
      if (session.active === playback) {
        session.active = null
        session.state = 'idle'
      }
      return outcome
    })
  }

  private async execute(
    session: ChatSession,
    playback: ActivePlayback,
    resources: { filePath: string | null }
  ): Promise<PlaybackOutcome> {
    const { request, channel, signal } = playback
    throwIfAborted(signal)

    const device = request.device
    if (!device) {
      throw new ConnectionError('No device selected. Use /setup to choose one.')
    }
    const started = this.now()
    logger.info({ input: request.input.kind, deviceId: device.id }, 'Playback requested')

    this.transition(session, playback, 'preparing_audio')
    channel.emit({ type: 'preparing', requestId: request.id, device })
    const filePath = await this.prepare(request.input, signal)
    resources.filePath = filePath

    this.transition(session, playback, 'awaiting_connection')
    const cast = await this.castSessionFor(session, device)
    if (!cast.isConnected(device)) {
      if (cast.requiresAudioServer) {
        channel.emit({ type: 'connecting', requestId: request.id, device })
      }
      await this.connectCast(cast, device, signal)
    }

    let source = filePath
    if (cast.requiresAudioServer) {
      this.transition(session, playback, 'serving')
      session.server ??= this.options.createAudioServer()
      source = await session.server.start(filePath)
      channel.emit({ type: 'serving', requestId: request.id, url: source })
    }
    throwIfAborted(signal)

    this.transition(session, playback, 'playing')
    await cast.play(source, signal)
    await this.awaitCompletion(cast, playback, device, started)

    const elapsedMs = this.now() - started
    this.transition(session, playback, 'complete')
    channel.emit({
      type: 'complete',
      requestId: request.id,
      device,
      elapsedMs,
      caption: request.input.kind === 'text' ? request.caption : undefined,
    })
    logger.info({ elapsedMs }, 'Playback complete')
    return { requestId: request.id, state: 'complete', elapsedMs }
  }

  private async prepare(input: PlaybackInput, signal: AbortSignal): Promise<string> {
    const { preparer } = this.options
    try {
      switch (input.kind) {
        case 'text':
          return await preparer.textToSpeech(input.text, signal)
        case 'voice':
          return await preparer.normalizeVoiceMessage(await input.load(signal), signal)
        case 'audio':
          return await preparer.storeAudioFile(await input.load(signal), input.extension, signal)
      }
    } catch (error) {
      if (signal.aborted) {
        throw abortReason(signal)
      }
      if (error instanceof SpeakerError) {
        throw error
      }
      throw new PrepError(`Could not prepare audio: ${errorMessage(error)}`, error)
    }
  }

  private async castSessionFor(session: ChatSession, device: Device): Promise<CastSession> {
    if (session.cast && session.cast.deviceType !== device.deviceType) {
      await this.dropConnection(session)
      session.cast = null
    }
    session.cast ??= this.options.createCastSession(device.deviceType)
    return session.cast
  }

  private async connectCast(cast: CastSession, device: Device, signal?: AbortSignal): Promise<void> {
    const seconds = Math.round(this.connectTimeoutMs / 1000)
    try {
      await withTimeout(
        (inner) => cast.connect(device, inner),
        this.connectTimeoutMs,
        () => new ConnectionError(`Timed out connecting to ${device.name} after ${seconds}s`),
        signal
      )
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal)
      }
      await cast.disconnect()
      if (error instanceof SpeakerError) {
        throw error
      }
      throw new ConnectionError(`Could not connect to ${device.name}: ${errorMessage(error)}`, error)
    }
  }

  private async awaitCompletion(
    cast: CastSession,
    playback: ActivePlayback,
    device: Device,
    started: number
  ): Promise<void> {
    const { request, channel, signal } = playback
    const playStarted = this.now()

    const report = (status: MediaStatus) => {
      channel.emit({
        type: 'playing',
        requestId: request.id,
        device,
        status: status.state,
        progress: progressOf(status),
        elapsedMs: this.now() - started,
      })
    }

    let played = cast.status().state === 'playing'
    report(cast.status())

    for (;;) {
      await sleep(this.pollIntervalMs, signal)
      const status = await cast.refreshStatus(signal)
      logger.debug({ status: describeStatus(status), currentTime: status.currentTime }, 'Polled status')

      switch (status.state) {
        case 'playing':
          played = true
          report(status)
          break
        case 'buffering':
        case 'paused':
          report(status)
          break
        case 'error':
          throw new PlaybackError(`Playback failed on ${device.name}`)
        case 'idle':
          if (status.idleReason === 'FINISHED' || played) {
            return
          }
          if (status.idleReason === 'CANCELLED') {
            throw new PlaybackError(`Playback was stopped on ${device.name}`)
          }
          // Short clips can start and finish between two polls
          if (this.now() - playStarted >= this.idleGraceMs) {
            return
          }
          break
      }
    }
  }

  private async fail(session: ChatSession, playback: ActivePlayback, error: unknown): Promise<PlaybackOutcome> {
    const { request } = playback

    if (playback.signal.aborted) {
      logger.info({ state: playback.state }, 'Playback cancelled')
      if (playback.state === 'playing') {
        await this.stopDevice(session)
      }
      return { requestId: request.id, state: 'cancelled' }
    }

    const failure = error instanceof SpeakerError ? error : new PlaybackError(errorMessage(error), error)
    logger.warn({ kind: failure.kind, state: playback.state, error: failure.message }, 'Playback failed')

    this.transition(session, playback, 'error')
    playback.channel.emit({ type: 'error', requestId: request.id, kind: failure.kind, message: failure.message })

    if (failure.kind === 'playback' || failure.kind === 'connection') {
      await this.dropConnection(session)
    }
    return { requestId: request.id, state: 'error', error: failure }
  }

  private async release(session: ChatSession, filePath: string | null): Promise<void> {
    if (session.server) {
      try {
        await session.server.stop()
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Failed to stop audio server')
      }
    }
    if (filePath) {
      try {
        await unlink(filePath)
      } catch (error) {
        logger.debug({ filePath, error: errorMessage(error) }, 'Temp file already gone')
      }
    }
  }

  private async stopDevice(session: ChatSession): Promise<void> {
    try {
      await session.cast?.stop()
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Device stop failed')
    }
  }

  private async dropConnection(session: ChatSession): Promise<void> {
    try {
      await session.cast?.disconnect()
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Disconnect failed')
    }
  }

  private transition(session: ChatSession, playback: ActivePlayback, state: PlaybackState): void {
    logger.debug({ from: playback.state, to: state }, 'Playback state')
    playback.state = state
    if (session.active === playback) {
      session.state = state
    }
  }
}
