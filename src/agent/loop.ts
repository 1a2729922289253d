/**
 * Speaker Loop
 * Drains the event queue and routes each chat event to a command handler
 * or the playback orchestrator.
 *
 * Events of one chat are handled in arrival order; different chats never
 * wait on each other. A playback only holds its chat until it is
 * registered with the orchestrator, so /stop or a newer message can
 * reach it while it plays.
 */

import {
  SETUP_NONE_FOUND_TEXT,
  SETUP_SCANNING_TEXT,
  connectFailedText,
  connectedText,
  connectingText,
  deviceListText,
  helpText,
  setupButtons,
  setupCompleteText,
  setupPromptText,
  statusText,
} from '../discord/commands.js'
import { ProgressReporter, processingText, stoppedText, type ProgressReporterOptions } from '../discord/progress.js'
import type { PlaybackInput, PlaybackOrchestrator, PlaybackOutcome } from '../playback/orchestrator.js'
import { expandVariables } from '../tts/variables.js'
import {
  errorMessage,
  type ChatConnector,
  type ChatOrigin,
  type CommandName,
  type Device,
  type Event,
  type SendOptions,
} from '../types.js'
import { createLogger, withSessionLogging } from '../utils/logger.js'
import { sleep } from '../utils/retry.js'
import type { EventQueue } from './event-queue.js'

const logger = createLogger({ module: 'loop' })

export interface DeviceDiscovery {
  discover(timeoutMs: number, signal?: AbortSignal): Promise<Device[]>
}

export interface SpeakerLoopOptions {
  /** User ids allowed to use the bot; empty allows everyone */
  allowedUsers: readonly string[]
  /** Prefix shown in help text */
  commandPrefix?: string
  discoveryTimeoutMs?: number
  setupDiscoveryTimeoutMs?: number
  progress?: ProgressReporterOptions
  now?: () => Date
}

interface PendingSetup {
  devices: Device[]
  messageId: string
}

export class SpeakerLoop {
  private running = false
  private chains = new Map<string, Promise<void>>()
  private pending = new Set<Promise<void>>()
  private setups = new Map<string, PendingSetup>()
  private allowedUsers: Set<string>

  constructor(
    private queue: EventQueue,
    private chat: ChatConnector,
    private orchestrator: PlaybackOrchestrator,
    private discovery: DeviceDiscovery,
    private options: SpeakerLoopOptions
  ) {
    this.allowedUsers = new Set(options.allowedUsers)
  }

  /**
   * Start the loop
   */
  async run(): Promise<void> {
    this.running = true
    logger.info({ allowedUsers: this.allowedUsers.size || 'everyone' }, 'Speaker loop started')

    while (this.running) {
      const batch = this.queue.pollBatch()
      if (batch.length > 0) {
        logger.debug({ batchSize: batch.length, types: batch.map((e) => e.type) }, 'Polled batch from queue')
        for (const event of batch) {
          this.enqueue(event)
        }
      } else {
        // Avoid busy-waiting
        await sleep(100)
      }
    }

    logger.info('Speaker loop stopped')
  }

  stop(): void {
    this.running = false
  }

  /**
   * Resolves when every handler and playback started so far has finished
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending])
    }
  }

  /**
   * Handle event after earlier events of the same chat
   */
  enqueue(event: Event): void {
    const chatId = event.origin.chatId
    const previous = this.chains.get(chatId) ?? Promise.resolve()
    const next = previous.then(() => this.handle(event))
    this.chains.set(chatId, next)
    this.track(next, () => {
      if (this.chains.get(chatId) === next) {
        this.chains.delete(chatId)
      }
    })
  }

  isAuthorized(userId: string): boolean {
    return this.allowedUsers.size === 0 || this.allowedUsers.has(userId)
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private track(task: Promise<void>, onDone?: () => void): void {
    const tracked: Promise<void> = task
      .catch((error) => {
        logger.error({ error: errorMessage(error) }, 'Background task failed')
      })
      .finally(() => {
        this.pending.delete(tracked)
        onDone?.()
      })
    this.pending.add(tracked)
  }

  private async handle(event: Event): Promise<void> {
    const { origin } = event
    if (!this.isAuthorized(origin.userId)) {
      logger.warn({ userId: origin.userId, username: origin.username, type: event.type }, 'Unauthorized access attempt')
      return
    }

    try {
      await withSessionLogging({ chatId: origin.chatId }, () => this.dispatch(event))
    } catch (error) {
      logger.error({ error: errorMessage(error), type: event.type }, 'Failed to handle event')
      await this.replySafely(origin, `Something went wrong: ${errorMessage(error)}`)
    }
  }

  private async dispatch(event: Event): Promise<void> {
    switch (event.type) {
      case 'command':
        logger.info({ command: event.command, user: event.origin.username }, 'Command received')
        return this.handleCommand(event.origin, event.command)
      case 'text_message': {
        const now = this.options.now?.() ?? new Date()
        return this.startPlayback(event.origin, { kind: 'text', text: expandVariables(event.text, now) })
      }
      case 'voice_message':
        return this.startPlayback(event.origin, {
          kind: 'voice',
          load: (signal) => this.chat.downloadAttachment(event.url, signal),
        })
      case 'audio_message':
        return this.startPlayback(event.origin, {
          kind: 'audio',
          load: (signal) => this.chat.downloadAttachment(event.url, signal),
          extension: event.extension,
        })
      case 'device_selected':
        return this.handleDeviceSelected(event.origin, event.deviceId)
      case 'setup_cancelled':
        this.setups.delete(event.origin.chatId)
        await this.chat.editMessage(event.origin.chatId, event.origin.messageId, 'Setup cancelled.')
        return
    }
  }

  private async handleCommand(origin: ChatOrigin, command: CommandName): Promise<void> {
    const { chatId } = origin
    switch (command) {
      case 'start':
      case 'help':
        await this.reply(origin, helpText(this.options.commandPrefix))
        return
      case 'setup':
        return this.runSetup(origin)
      case 'connect':
        return this.runConnect(origin)
      case 'status':
        await this.reply(origin, statusText(await this.orchestrator.getStatus(chatId)))
        return
      case 'devices': {
        await this.reply(origin, 'Scanning for devices...')
        const devices = await this.discovery.discover(this.options.discoveryTimeoutMs ?? 5_000)
        await this.reply(origin, deviceListText(devices))
        return
      }
      case 'stop': {
        const stopped = await this.orchestrator.cancel(chatId)
        await this.reply(origin, stopped ? 'Playback stopped.' : 'Nothing is playing.')
        return
      }
    }
  }

  private async runSetup(origin: ChatOrigin): Promise<void> {
    await this.reply(origin, SETUP_SCANNING_TEXT)
    const devices = await this.discovery.discover(this.options.setupDiscoveryTimeoutMs ?? 15_000)
    if (devices.length === 0) {
      this.setups.delete(origin.chatId)
      await this.reply(origin, SETUP_NONE_FOUND_TEXT)
      return
    }

    const messageId = await this.reply(origin, setupPromptText(devices.length), { buttons: setupButtons(devices) })
    this.setups.set(origin.chatId, { devices, messageId })
    logger.info({ count: devices.length }, 'Setup offered devices')
  }

  private async handleDeviceSelected(origin: ChatOrigin, deviceId: string): Promise<void> {
    const { chatId, messageId } = origin
    // Buttons of an older setup message are stale
    const setup = this.setups.get(chatId)
    const device = setup?.messageId === messageId ? setup.devices.find((d) => d.id === deviceId) : undefined
    if (!device) {
      await this.chat.editMessage(chatId, messageId, 'Device not found. Please run /setup again.')
      return
    }

    this.setups.delete(chatId)
    await this.orchestrator.selectDevice(chatId, device)
    await this.chat.editMessage(chatId, messageId, setupCompleteText(device))
  }

  private async runConnect(origin: ChatOrigin): Promise<void> {
    const { chatId } = origin
    const { device, connected } = await this.orchestrator.getStatus(chatId)
    if (!device) {
      await this.reply(origin, 'No device configured. Use /setup first.')
      return
    }
    if (device.deviceType === 'macos_say') {
      await this.orchestrator.connect(chatId)
      await this.reply(origin, `Device ${device.name} doesn't need connection (local playback).`)
      return
    }
    if (connected) {
      await this.reply(origin, `Already connected to ${device.name}`)
      return
    }

    const messageId = await this.reply(origin, connectingText(device))
    try {
      await this.orchestrator.connect(chatId)
      await this.chat.editMessage(chatId, messageId, connectedText(device))
    } catch (error) {
      logger.warn({ error: errorMessage(error), deviceId: device.id }, 'Connect command failed')
      await this.chat.editMessage(chatId, messageId, connectFailedText(device, errorMessage(error)))
    }
  }

  private async startPlayback(origin: ChatOrigin, input: PlaybackInput): Promise<void> {
    const { chatId } = origin
    const { device } = await this.orchestrator.getStatus(chatId)
    if (!device) {
      await this.reply(origin, 'No device configured. Use /setup to select a playback device.')
      return
    }

    const messageId = await this.reply(origin, processingText(device.name))
    const reporter = new ProgressReporter(this.chat, chatId, messageId, device.name, this.options.progress)
    const { settled } = await this.orchestrator.begin(chatId, input, (event) => reporter.handle(event))
    this.track(this.finishPlayback(chatId, messageId, device, reporter, settled))
  }

  private async finishPlayback(
    chatId: string,
    messageId: string,
    device: Device,
    reporter: ProgressReporter,
    settled: Promise<PlaybackOutcome>
  ): Promise<void> {
    const outcome = await settled
    reporter.close()
    if (outcome.state === 'cancelled') {
      await this.chat.editMessage(chatId, messageId, stoppedText(device.name))
    }
  }

  private reply(origin: ChatOrigin, text: string, options: SendOptions = {}): Promise<string> {
    return this.chat.sendMessage(origin.chatId, text, { replyTo: origin.messageId, ...options })
  }

  private async replySafely(origin: ChatOrigin, text: string): Promise<void> {
    try {
      await this.reply(origin, text)
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Could not send error reply')
    }
  }
}
