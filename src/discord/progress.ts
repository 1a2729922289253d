/**
 * Progress message rendering
 *
 * One status message per playback, edited as PlaybackEvents arrive.
 */

import type { PlaybackEvent } from '../playback/events.js'
import { errorMessage, type ErrorKind } from '../types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger({ module: 'progress' })

const PROCESS_FRAMES = ['[ o     ] Processing', '[   o   ] Processing', '[     o ] Processing', '[   o   ] Processing']

const BAR_WIDTH = 10
const CAPTION_CHARS = 50

export function progressBar(filled: number): string {
  const n = Math.max(0, Math.min(BAR_WIDTH, filled))
  return '▓'.repeat(n) + '░'.repeat(BAR_WIDTH - n)
}

export interface RenderContext {
  deviceName: string
  /** Animation step */
  frame: number
}

export function processingText(deviceName: string, frame = 0): string {
  return `${PROCESS_FRAMES[frame % PROCESS_FRAMES.length]}\n\n${deviceName}`
}

export function errorText(kind: ErrorKind, message: string): string {
  switch (kind) {
    case 'prep':
      return `Could not prepare audio.\n\n${message}`
    case 'connection':
      return message.includes('/setup')
        ? message
        : `${message}\n\nMake sure the device is powered on and on the same network.`
    case 'device_busy':
      return `${message}\n\nThe device is busy. Try again in a moment.`
    case 'playback':
      return `Playback failed: ${message}\n\nCheck the device connection and try again.`
    case 'server':
      return `Could not serve audio: ${message}`
    case 'cancelled':
      return 'Playback cancelled.'
  }
}

export function renderProgress(event: PlaybackEvent, ctx: RenderContext): string {
  switch (event.type) {
    case 'preparing':
      return processingText(event.device.name, ctx.frame)
    case 'connecting':
      return `[ o ] Connecting to ${event.device.name}...\n\nThis may wake up the device.`
    case 'serving':
      return `[ o ] Sending audio\n\n${ctx.deviceName}`
    case 'playing': {
      // Without a duration the bar just cycles
      const filled = event.progress === undefined
        ? ctx.frame % (BAR_WIDTH + 1)
        : Math.round(event.progress * BAR_WIDTH)
      const label = event.status === 'playing' ? 'Playing ' : event.status === 'paused' ? 'Paused  ' : 'Loading '
      return `> ${label} ${progressBar(filled)}\n\n${event.device.name}`
    }
    case 'complete': {
      const done = `Playback complete\n\n${event.device.name}`
      if (!event.caption) {
        return done
      }
      const excerpt = event.caption.length > CAPTION_CHARS ? `${event.caption.slice(0, CAPTION_CHARS)}...` : event.caption
      return `${done}\n${excerpt}`
    }
    case 'error':
      return errorText(event.kind, event.message)
  }
}

export function stoppedText(deviceName: string): string {
  return `Playback stopped\n\n${deviceName}`
}

export interface MessageEditor {
  editMessage(chatId: string, messageId: string, text: string): Promise<void>
}

export interface ProgressReporterOptions {
  /** Minimum gap between two "playing" edits */
  minEditIntervalMs?: number
  /** Gap between processing frames while audio is prepared; 0 turns the animation off */
  frameIntervalMs?: number
  now?: () => number
}

/**
 * Edits one status message as events arrive. Repeated "playing" updates
 * are throttled; every other event is shown. While audio is prepared the
 * processing frame keeps cycling until the next event or close().
 */
export class ProgressReporter {
  private frame = 0
  private lastText: string | null = null
  private lastType: PlaybackEvent['type'] | null = null
  private lastEditAt = 0
  private minEditIntervalMs: number
  private frameIntervalMs: number
  private now: () => number
  private animation: NodeJS.Timeout | null = null
  private edits: Promise<void> = Promise.resolve()

  constructor(
    private editor: MessageEditor,
    private chatId: string,
    private messageId: string,
    private deviceName: string,
    options: ProgressReporterOptions = {}
  ) {
    this.minEditIntervalMs = options.minEditIntervalMs ?? 1_500
    this.frameIntervalMs = options.frameIntervalMs ?? 1_500
    this.now = options.now ?? Date.now
  }

  async handle(event: PlaybackEvent): Promise<void> {
    if ('device' in event) {
      this.deviceName = event.device.name
    }
    if (event.type === 'preparing') {
      this.startAnimation()
    } else {
      this.stopAnimation()
    }

    const text = renderProgress(event, { deviceName: this.deviceName, frame: this.frame++ })
    if (text === this.lastText) {
      return
    }
    const repeat = event.type === 'playing' && this.lastType === 'playing'
    if (repeat && this.now() - this.lastEditAt < this.minEditIntervalMs) {
      return
    }

    this.lastText = text
    this.lastType = event.type
    this.lastEditAt = this.now()
    logger.debug({ chatId: this.chatId, messageId: this.messageId, type: event.type }, 'Updating progress message')
    await this.enqueueEdit(text)
  }

  /** Stop the processing animation */
  close(): void {
    this.stopAnimation()
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private startAnimation(): void {
    if (this.frameIntervalMs <= 0 || this.animation) {
      return
    }
    this.animation = setInterval(() => {
      const text = processingText(this.deviceName, this.frame++)
      this.enqueueEdit(text, true).catch((error: unknown) => {
        logger.debug({ error: errorMessage(error), messageId: this.messageId }, 'Processing frame edit failed')
      })
    }, this.frameIntervalMs)
    this.animation.unref()
  }

  private stopAnimation(): void {
    if (this.animation) {
      clearInterval(this.animation)
      this.animation = null
    }
  }

  /** Edits run one at a time so a late frame never overwrites a newer state */
  private enqueueEdit(text: string, frame = false): Promise<void> {
    const next = this.edits.then(async () => {
      if (frame && !this.animation) {
        return
      }
      if (frame) {
        this.lastText = text
      }
      await this.editor.editMessage(this.chatId, this.messageId, text)
    })
    this.edits = next.then(
      () => undefined,
      () => undefined
    )
    return next
  }
}
