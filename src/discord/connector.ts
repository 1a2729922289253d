/**
 * Discord Connector
 * Turns gateway messages and button clicks into queue events, and sends,
 * edits and downloads on behalf of the loop.
 *
 * Direct messages are always handled; in guild channels the bot only
 * reacts when mentioned.
 */

import { extname } from 'path'
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ChannelType,
  Client,
  GatewayIntentBits,
  MessageFlags,
  Partials,
  type ButtonInteraction,
  type Message,
} from 'discord.js'
import type { EventQueue } from '../agent/event-queue.js'
import { DiscordError, errorMessage, type ChatConnector, type ChatOrigin, type Event, type MessageButton, type SendOptions } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { retryDiscord } from '../utils/retry.js'
import { parseButtonId, parseInput } from './commands.js'

const logger = createLogger({ module: 'discord' })

const MAX_ATTACHMENT_BYTES = 25 * 1024 * 1024
const BUTTONS_PER_ROW = 5
const MAX_ROWS = 5

const AUDIO_EXTENSIONS = new Set(['.mp3', '.ogg', '.oga', '.opus', '.wav', '.m4a', '.aac', '.flac', '.aif', '.aiff'])

export interface ConnectorOptions {
  token: string
  maxBackoffMs: number
  commandPrefixes: readonly string[]
}

/** The parts of a gateway message the bot looks at */
export interface InboundMessage {
  id: string
  chatId: string
  authorId: string
  authorName: string
  isBot: boolean
  isDirect: boolean
  mentionsBot: boolean
  isVoice: boolean
  content: string
  attachments: Array<{ url: string; name: string; contentType: string | null }>
}

function attachmentExtension(attachment: { name: string; contentType: string | null }): string | null {
  const ext = extname(attachment.name).toLowerCase()
  if (AUDIO_EXTENSIONS.has(ext)) {
    return ext
  }
  if (attachment.contentType?.startsWith('audio/')) {
    const subtype = attachment.contentType.slice('audio/'.length).split(';')[0] ?? ''
    return subtype === 'mpeg' ? '.mp3' : `.${subtype}`
  }
  return null
}

/**
 * Map a message to a queue event, or null when the bot should ignore it
 */
export function classifyMessage(message: InboundMessage, prefixes: readonly string[], now = new Date()): Event | null {
  if (message.isBot || (!message.isDirect && !message.mentionsBot)) {
    return null
  }

  const origin: ChatOrigin = {
    chatId: message.chatId,
    userId: message.authorId,
    username: message.authorName,
    messageId: message.id,
  }

  const [first] = message.attachments
  if (message.isVoice && first) {
    return { type: 'voice_message', origin, url: first.url, timestamp: now }
  }
  for (const attachment of message.attachments) {
    const extension = attachmentExtension(attachment)
    if (extension) {
      return { type: 'audio_message', origin, url: attachment.url, extension, timestamp: now }
    }
  }

  const content = message.content.replace(/<@!?\d+>/g, ' ')
  const parsed = parseInput(content, prefixes)
  switch (parsed.kind) {
    case 'command':
      return { type: 'command', origin, command: parsed.command, args: parsed.args, timestamp: now }
    case 'text':
      return { type: 'text_message', origin, text: parsed.text, timestamp: now }
    case 'unknown_command':
      logger.debug({ name: parsed.name, messageId: message.id }, 'Ignoring unknown command')
      return null
    case 'empty':
      return null
  }
}

export function buttonRows(buttons: readonly MessageButton[]): ActionRowBuilder<ButtonBuilder>[] {
  const rows: ActionRowBuilder<ButtonBuilder>[] = []
  const usable = buttons.slice(0, BUTTONS_PER_ROW * MAX_ROWS)
  for (let i = 0; i < usable.length; i += BUTTONS_PER_ROW) {
    const row = new ActionRowBuilder<ButtonBuilder>()
    for (const button of usable.slice(i, i + BUTTONS_PER_ROW)) {
      row.addComponents(
        new ButtonBuilder()
          .setCustomId(button.id)
          .setLabel(button.label)
          .setStyle(button.style === 'danger' ? ButtonStyle.Danger : button.style === 'secondary' ? ButtonStyle.Secondary : ButtonStyle.Primary)
      )
    }
    rows.push(row)
  }
  return rows
}

export class DiscordConnector implements ChatConnector {
  private client: Client

  constructor(
    private queue: EventQueue,
    private options: ConnectorOptions
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
      // DM channels arrive uncached
      partials: [Partials.Channel],
    })

    this.setupEventHandlers()
  }

  /**
   * Start the Discord client
   */
  async start(): Promise<void> {
    try {
      await this.client.login(this.options.token)
      logger.info({ userId: this.client.user?.id, tag: this.client.user?.tag }, 'Discord connector started')
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to start Discord connector')
      throw new DiscordError('Failed to connect to Discord', error)
    }
  }

  async stop(): Promise<void> {
    await this.client.destroy()
    logger.info('Discord connector stopped')
  }

  async sendMessage(chatId: string, text: string, options: SendOptions = {}): Promise<string> {
    return retryDiscord(async () => {
      const channel = await this.client.channels.fetch(chatId)
      if (!channel?.isSendable()) {
        throw new DiscordError(`Channel ${chatId} not found`)
      }

      const sent = await channel.send({
        content: text,
        components: buttonRows(options.buttons ?? []),
        allowedMentions: { repliedUser: false },
        // A deleted reply target must not fail the send
        reply: options.replyTo ? { messageReference: options.replyTo, failIfNotExists: false } : undefined,
      })
      logger.debug({ chatId, messageId: sent.id, replyTo: options.replyTo }, 'Sent message')
      return sent.id
    }, this.options.maxBackoffMs)
  }

  async editMessage(chatId: string, messageId: string, text: string, options: { buttons?: MessageButton[] } = {}): Promise<void> {
    return retryDiscord(async () => {
      const channel = await this.client.channels.fetch(chatId)
      if (!channel?.isTextBased()) {
        throw new DiscordError(`Channel ${chatId} not found`)
      }

      const message = await channel.messages.fetch(messageId)
      await message.edit({ content: text, components: buttonRows(options.buttons ?? []) })
      logger.debug({ chatId, messageId, length: text.length }, 'Edited message')
    }, this.options.maxBackoffMs)
  }

  async downloadAttachment(url: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await fetch(url, { signal })
    if (!response.ok) {
      throw new DiscordError(`Attachment download failed: HTTP ${response.status}`, { url })
    }
    const length = Number(response.headers.get('content-length') ?? 0)
    if (length > MAX_ATTACHMENT_BYTES) {
      throw new DiscordError(`Attachment too large (${length} bytes)`, { url })
    }

    const data = Buffer.from(await response.arrayBuffer())
    logger.debug({ bytes: data.length }, 'Downloaded attachment')
    return data
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private setupEventHandlers(): void {
    this.client.on('ready', () => {
      logger.info({ user: this.client.user?.tag }, 'Discord client ready')
    })

    this.client.on('messageCreate', (message) => {
      logger.debug(
        {
          messageId: message.id,
          channelId: message.channelId,
          author: message.author.username,
          content: message.content.substring(0, 50),
        },
        'Received messageCreate event'
      )

      const event = classifyMessage(this.toInbound(message), this.options.commandPrefixes)
      if (event) {
        this.queue.push(event)
      }
    })

    this.client.on('interactionCreate', (interaction) => {
      if (interaction.isButton()) {
        this.handleButton(interaction).catch((error) => {
          logger.warn({ error: errorMessage(error), customId: interaction.customId }, 'Failed to handle button')
        })
      }
    })

    this.client.on('error', (error) => {
      logger.error({ error: error.message }, 'Discord client error')
    })

    this.client.on('shardDisconnect', (event, shardId) => {
      logger.warn({ code: event.code, shardId }, 'Gateway disconnected, discord.js will reconnect')
    })
  }

  private async handleButton(interaction: ButtonInteraction): Promise<void> {
    const action = parseButtonId(interaction.customId)
    if (!action) {
      return
    }

    // Acknowledge within Discord's 3s window; the loop edits the message later
    await interaction.deferUpdate()

    const origin: ChatOrigin = {
      chatId: interaction.channelId,
      userId: interaction.user.id,
      username: interaction.user.username,
      messageId: interaction.message.id,
    }
    const timestamp = new Date()

    this.queue.push(
      action.kind === 'select'
        ? { type: 'device_selected', origin, deviceId: action.deviceId, interactionId: interaction.id, timestamp }
        : { type: 'setup_cancelled', origin, interactionId: interaction.id, timestamp }
    )
  }

  private toInbound(message: Message): InboundMessage {
    const botId = this.client.user?.id
    return {
      id: message.id,
      chatId: message.channelId,
      authorId: message.author.id,
      authorName: message.author.username,
      isBot: message.author.bot,
      isDirect: message.channel.type === ChannelType.DM,
      mentionsBot: !!botId && message.mentions.users.has(botId),
      isVoice: message.flags.has(MessageFlags.IsVoiceMessage),
      content: message.content,
      attachments: [...message.attachments.values()].map((a) => ({ url: a.url, name: a.name, contentType: a.contentType })),
    }
  }
}
