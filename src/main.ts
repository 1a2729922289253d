/**
 * Cast Speaker Bot
 * Main entry point
 */

import { mkdir } from 'fs/promises'
import { EventQueue } from './agent/event-queue.js'
import { SpeakerLoop } from './agent/loop.js'
import { createCastSessionFactory } from './cast/index.js'
import { loadAppConfig } from './config/app-config.js'
import { YamlDeviceStore } from './config/device-store.js'
import { DeviceRegistry } from './devices/registry.js'
import { DiscordConnector } from './discord/connector.js'
import { PlaybackOrchestrator } from './playback/orchestrator.js'
import { AudioServer } from './server/audio-server.js'
import { SpeechSynthesizer } from './tts/index.js'
import { errorMessage } from './types.js'
import { logger } from './utils/logger.js'

async function main() {
  try {
    logger.info('Starting cast speaker bot')

    const config = loadAppConfig()
    const { settings } = config
    await mkdir(config.audioDir, { recursive: true })

    logger.info(
      {
        configPath: config.configPath,
        audioDir: config.audioDir,
        player: config.playerCommand.command,
        allowedUsers: settings.allowed_users.length,
      },
      'Configuration loaded'
    )

    // Initialize components
    const queue = new EventQueue()
    const registry = new DeviceRegistry()
    const deviceStore = new YamlDeviceStore(config.deviceStorePath)

    const preparer = new SpeechSynthesizer({
      audioDir: config.audioDir,
      voice: settings.voice,
      rate: settings.speech_rate,
      ffmpegPath: settings.ffmpeg_path,
    })

    const createCastSession = createCastSessionFactory({
      player: config.playerCommand,
      googlecast: {
        keepAliveIntervalMs: settings.keepalive_interval_ms,
        // Stored addresses go stale when DHCP hands out a new lease
        locate: async (device, signal) => {
          const found = await registry.locate(device.id, settings.discovery_timeout_ms, signal)
          return found?.address ?? null
        },
      },
    })

    const orchestrator = new PlaybackOrchestrator({
      preparer,
      deviceStore,
      createCastSession,
      createAudioServer: () =>
        new AudioServer({
          advertiseHost: settings.advertise_host,
          idleTimeoutMs: settings.server_idle_timeout_ms,
        }),
      connectTimeoutMs: settings.connect_timeout_ms,
      pollIntervalMs: settings.poll_interval_ms,
      sessionIdleMs: settings.session_idle_ms,
    })

    const connector = new DiscordConnector(queue, {
      token: config.discordToken,
      commandPrefixes: settings.command_prefixes,
      maxBackoffMs: 32000,
    })

    const loop = new SpeakerLoop(queue, connector, orchestrator, registry, {
      allowedUsers: settings.allowed_users,
      commandPrefix: settings.command_prefixes[0],
      discoveryTimeoutMs: settings.discovery_timeout_ms,
      setupDiscoveryTimeoutMs: settings.setup_discovery_timeout_ms,
    })

    await connector.start()

    // Handle shutdown
    let shuttingDown = false
    const shutdown = async (signal: string) => {
      if (shuttingDown) {
        return
      }
      shuttingDown = true
      logger.info({ signal }, 'Shutting down')

      loop.stop()
      await orchestrator.shutdown()
      await loop.idle()
      await connector.stop()

      process.exit(0)
    }

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error) => {
        logger.error({ error: errorMessage(error) }, 'Shutdown failed')
        process.exit(1)
      })
    }
    process.on('SIGINT', () => onSignal('SIGINT'))
    process.on('SIGTERM', () => onSignal('SIGTERM'))

    // Start the loop
    await loop.run()
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, 'Fatal error')
    process.exit(1)
  }
}

// Run
main().catch((error) => {
  console.error('Unhandled error:', error)
  process.exit(1)
})
