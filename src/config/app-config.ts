/**
 * Application configuration
 *
 * Settings come from <CONFIG_PATH>/speaker.yaml (optional) with environment
 * overrides for the deployment-specific bits. The Discord token is read from
 * DISCORD_TOKEN, DISCORD_TOKEN_FILE, or ./discord_token.
 */

import { existsSync, readFileSync } from 'fs'
import { join, resolve } from 'path'
import { tmpdir, platform } from 'os'
import yaml from 'js-yaml'
import { z } from 'zod'
import { logger } from '../utils/logger.js'

const playerCommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
})

export type PlayerCommand = z.infer<typeof playerCommandSchema>

const settingsSchema = z.object({
  allowed_users: z.array(z.coerce.string()).default([]),
  command_prefixes: z.array(z.string().min(1)).default(['/', '!']),
  voice: z.string().default('Mei-Jia'),
  speech_rate: z.number().int().positive().default(150),
  advertise_host: z.string().optional(),
  connect_timeout_ms: z.number().int().positive().default(10_000),
  server_idle_timeout_ms: z.number().int().positive().default(120_000),
  poll_interval_ms: z.number().int().positive().default(1_000),
  keepalive_interval_ms: z.number().int().positive().default(25_000),
  discovery_timeout_ms: z.number().int().positive().default(5_000),
  setup_discovery_timeout_ms: z.number().int().positive().default(15_000),
  session_idle_ms: z.number().int().positive().default(6 * 60 * 60 * 1000),
  player_command: playerCommandSchema.optional(),
  ffmpeg_path: z.string().default('ffmpeg'),
  audio_dir: z.string().optional(),
})

export type SpeakerSettings = z.infer<typeof settingsSchema>

export interface AppConfig {
  configPath: string
  deviceStorePath: string
  discordToken: string
  settings: SpeakerSettings
  audioDir: string
  playerCommand: PlayerCommand
}

export class ConfigError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Parse a speaker.yaml document. Empty input yields all defaults.
 */
export function parseSettings(source: string): SpeakerSettings {
  const raw: unknown = yaml.load(source) ?? {}
  const result = settingsSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(`Invalid speaker settings: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`, result.error)
  }
  return result.data
}

export function defaultPlayerCommand(os: NodeJS.Platform = platform()): PlayerCommand {
  if (os === 'darwin') {
    return { command: 'afplay', args: [] }
  }
  return { command: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'quiet'] }
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = resolve(env.CONFIG_PATH || './config')
  const settingsPath = join(configPath, 'speaker.yaml')

  let settings: SpeakerSettings
  if (existsSync(settingsPath)) {
    settings = parseSettings(readFileSync(settingsPath, 'utf-8'))
    logger.info({ settingsPath }, 'Loaded speaker settings')
  } else {
    settings = parseSettings('')
    logger.info({ settingsPath }, 'No speaker settings file, using defaults')
  }

  if (env.ADVERTISE_HOST) {
    settings.advertise_host = env.ADVERTISE_HOST
  }
  if (env.ALLOWED_USERS) {
    settings.allowed_users = env.ALLOWED_USERS.split(',').map(s => s.trim()).filter(Boolean)
  }

  return {
    configPath,
    deviceStorePath: join(configPath, 'selected-device.yaml'),
    discordToken: readDiscordToken(env),
    settings,
    audioDir: resolve(settings.audio_dir ?? join(tmpdir(), 'cast-speaker-bot')),
    playerCommand: settings.player_command ?? defaultPlayerCommand(),
  }
}

function readDiscordToken(env: NodeJS.ProcessEnv): string {
  if (env.DISCORD_TOKEN) {
    return env.DISCORD_TOKEN.trim()
  }

  const tokenFile = env.DISCORD_TOKEN_FILE
    ? resolve(env.DISCORD_TOKEN_FILE)
    : join(process.cwd(), 'discord_token')

  let token: string
  try {
    token = readFileSync(tokenFile, 'utf-8').trim()
  } catch (error) {
    throw new ConfigError(`Could not read token file: ${tokenFile}. Set DISCORD_TOKEN or create the file.`, error)
  }

  if (!token) {
    throw new ConfigError(`Token file is empty: ${tokenFile}`)
  }
  return token
}
