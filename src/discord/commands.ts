/**
 * Chat commands: parsing, setup buttons and reply texts
 */

import type { SessionStatus } from '../playback/orchestrator.js'
import type { CommandName, Device, MessageButton } from '../types.js'

export const COMMAND_NAMES: readonly CommandName[] = ['start', 'help', 'setup', 'connect', 'status', 'devices', 'stop']

export const SELECT_PREFIX = 'select_'
export const CANCEL_SETUP = 'cancel_setup'

// Discord caps button labels at 80 characters
const MAX_LABEL = 80

export type ParsedInput =
  | { kind: 'command'; command: CommandName; args: string[] }
  | { kind: 'unknown_command'; name: string }
  | { kind: 'text'; text: string }
  | { kind: 'empty' }

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((command) => command === name)
}

/**
 * Classify message content. A prefix followed by a word is a command;
 * anything else is text to speak.
 */
export function parseInput(content: string, prefixes: readonly string[]): ParsedInput {
  const text = content.trim()
  if (!text) {
    return { kind: 'empty' }
  }

  for (const prefix of prefixes) {
    if (!prefix || !text.startsWith(prefix)) {
      continue
    }
    const [head = '', ...args] = text.slice(prefix.length).split(/\s+/)
    const name = head.toLowerCase()
    if (!/^[a-z]+$/.test(name)) {
      continue
    }
    return isCommandName(name) ? { kind: 'command', command: name, args } : { kind: 'unknown_command', name }
  }

  return { kind: 'text', text }
}

export type ButtonAction = { kind: 'select'; deviceId: string } | { kind: 'cancel' }

export function parseButtonId(customId: string): ButtonAction | null {
  if (customId === CANCEL_SETUP) {
    return { kind: 'cancel' }
  }
  if (customId.startsWith(SELECT_PREFIX) && customId.length > SELECT_PREFIX.length) {
    return { kind: 'select', deviceId: customId.slice(SELECT_PREFIX.length) }
  }
  return null
}

export function deviceLabel(device: Device): string {
  const suffix = device.deviceType === 'googlecast' ? ' (Google)' : ' (macOS)'
  const room = MAX_LABEL - suffix.length
  const name = device.name.length > room ? `${device.name.slice(0, room - 1)}…` : device.name
  return name + suffix
}

// Discord allows 25 buttons per message; one is Cancel
const MAX_DEVICE_BUTTONS = 24

export function setupButtons(devices: readonly Device[]): MessageButton[] {
  return [
    ...devices
      .slice(0, MAX_DEVICE_BUTTONS)
      .map((device): MessageButton => ({ id: SELECT_PREFIX + device.id, label: deviceLabel(device), style: 'primary' })),
    { id: CANCEL_SETUP, label: 'Cancel', style: 'secondary' },
  ]
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text
}

// ============================================================================
// Reply texts
// ============================================================================

export function helpText(prefix = '/'): string {
  return [
    'Welcome to Cast Speaker Bot!',
    '',
    "Send me a voice message, an audio file or some text and I'll play it on your device.",
    'Text may contain $TIME, which is read out as the current time.',
    '',
    'Commands:',
    `${prefix}setup - Configure playback device`,
    `${prefix}connect - Wake up and connect to device`,
    `${prefix}status - Show current device`,
    `${prefix}devices - List available devices`,
    `${prefix}stop - Stop the current playback`,
    `${prefix}help - Show this help message`,
  ].join('\n')
}

export function statusText(status: SessionStatus): string {
  const { device } = status
  if (!device) {
    return 'No device selected. Use /setup to configure.'
  }

  const lines = ['Current device:', `  Name: ${device.name}`, `  Type: ${device.deviceType}`]
  if (device.address) {
    lines.push(`  Address: ${device.address}`)
  }
  if (device.deviceType === 'googlecast') {
    lines.push(`  Connection: ${status.connected ? 'connected' : 'not connected'}`)
  }

  if (status.playing !== null) {
    lines.push('', `Now playing: ${truncate(status.playing, 50)}`)
  } else if (status.lastOutcome?.state === 'error') {
    lines.push('', `Last playback failed: ${status.lastOutcome.error.message}`)
  }
  return lines.join('\n')
}

export function deviceListText(devices: readonly Device[]): string {
  if (devices.length === 0) {
    return 'No devices found.'
  }
  const rows = devices.map((device, i) => `${i + 1}. ${device.name} (${device.deviceType})`)
  return ['Available devices:', '', ...rows].join('\n')
}

export const SETUP_SCANNING_TEXT = [
  'Starting device setup...',
  '',
  'Step 1/3: Scanning for available devices...',
  'Please wait (~15 seconds) while I discover devices on your network.',
].join('\n')

export const SETUP_NONE_FOUND_TEXT = [
  'No devices found!',
  '',
  'Make sure:',
  '- Google Home/Chromecast is on the same network',
  "- Or you're running on macOS for the local 'say' device",
  '',
  'Try /setup again after checking.',
].join('\n')

export function setupPromptText(count: number): string {
  return `Step 2/3: Select a device\n\nFound ${count} device(s).\nTap to select your playback device:`
}

export function setupCompleteText(device: Device): string {
  return [
    'Step 3/3: Setup complete!',
    '',
    `Selected device: ${device.name}`,
    `Type: ${device.deviceType}`,
    '',
    'You can now send voice messages and they will play on this device.',
    '',
    'Use /status to check current device',
    'Use /setup to change device',
  ].join('\n')
}

export function connectingText(device: Device): string {
  return `[ o ] Connecting to ${device.name}...\n\nThis may wake up the device.`
}

export function connectedText(device: Device): string {
  return `Connected to ${device.name}\n\nDevice is ready. You can now send text or voice messages.`
}

export function connectFailedText(device: Device, reason: string): string {
  return `Failed to connect to ${device.name}\n\n${reason}\nMake sure the device is powered on and on the same network.`
}
