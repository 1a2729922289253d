/**
 * Shared types for the speaker bot
 */

// ============================================================================
// Devices
// ============================================================================

export type DeviceType = 'googlecast' | 'macos_say'

export interface Device {
  readonly id: string
  readonly name: string
  readonly address: string | null  // null for local playback
  readonly deviceType: DeviceType
}

export function isSameDevice(a: Device | null | undefined, b: Device | null | undefined): boolean {
  return !!a && !!b && a.id === b.id && a.deviceType === b.deviceType
}

// ============================================================================
// Chat events
// ============================================================================

export type CommandName = 'start' | 'help' | 'setup' | 'connect' | 'status' | 'devices' | 'stop'

export interface ChatOrigin {
  chatId: string
  userId: string
  username: string
  messageId: string
}

export type Event =
  | { type: 'command'; origin: ChatOrigin; command: CommandName; args: string[]; timestamp: Date }
  | { type: 'text_message'; origin: ChatOrigin; text: string; timestamp: Date }
  | { type: 'voice_message'; origin: ChatOrigin; url: string; timestamp: Date }
  | { type: 'audio_message'; origin: ChatOrigin; url: string; extension: string; timestamp: Date }
  | { type: 'device_selected'; origin: ChatOrigin; deviceId: string; interactionId: string; timestamp: Date }
  | { type: 'setup_cancelled'; origin: ChatOrigin; interactionId: string; timestamp: Date }

// ============================================================================
// Chat front end
// ============================================================================

export interface MessageButton {
  id: string
  label: string
  style?: 'primary' | 'secondary' | 'danger'
}

export interface SendOptions {
  replyTo?: string
  buttons?: MessageButton[]
}

/**
 * What the loop needs from the chat platform. Edits replace the message's
 * buttons (none when omitted).
 */
export interface ChatConnector {
  sendMessage(chatId: string, text: string, options?: SendOptions): Promise<string>
  editMessage(chatId: string, messageId: string, text: string, options?: { buttons?: MessageButton[] }): Promise<void>
  downloadAttachment(url: string, signal?: AbortSignal): Promise<Buffer>
}

// ============================================================================
// Errors
// ============================================================================

export type ErrorKind = 'prep' | 'connection' | 'device_busy' | 'playback' | 'server' | 'cancelled'

export abstract class SpeakerError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, public readonly details?: unknown) {
    super(message)
    this.name = new.target.name
  }
}

/** Text-to-speech or audio conversion failed */
export class PrepError extends SpeakerError {
  readonly kind = 'prep'
}

/** Device unreachable, not selected, or connect timed out */
export class ConnectionError extends SpeakerError {
  readonly kind = 'connection'
}

/** Target refused playback because something else holds it */
export class DeviceBusyError extends SpeakerError {
  readonly kind = 'device_busy'
}

export class PlaybackError extends SpeakerError {
  readonly kind = 'playback'
}

/** Port bind or file I/O failure in the audio server */
export class ServerError extends SpeakerError {
  readonly kind = 'server'
}

export class CancelledError extends SpeakerError {
  readonly kind = 'cancelled'
}

export class DiscordError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message)
    this.name = 'DiscordError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
