/**
 * Speech and audio preparation
 *
 * Turns inbound chat content into a playable audio file under audioDir:
 * - text: macOS `say` renders AIFF, ffmpeg encodes it to MP3
 * - voice messages: OGG/Opus converted to MP3 (raw OGG when ffmpeg is missing)
 * - audio attachments: written as-is
 *
 * Every failure surfaces as PrepError with no files left behind.
 */

import { execFile } from 'child_process'
import { randomUUID } from 'crypto'
import { mkdir, stat, unlink, writeFile } from 'fs/promises'
import { join } from 'path'
import { promisify } from 'util'
import { PrepError, errorMessage } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { abortReason, throwIfAborted } from '../utils/retry.js'

const logger = createLogger({ module: 'speech' })

const execFileAsync = promisify(execFile)

/** Files below this size are treated as failed conversions */
export const MIN_AUDIO_BYTES = 100

export type CommandRunner = (
  file: string,
  args: string[],
  options: { signal?: AbortSignal }
) => Promise<{ stdout: string; stderr: string }>

export const runCommand: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, { signal: options.signal, maxBuffer: 4 * 1024 * 1024 })
  return { stdout, stderr }
}

export interface AudioPreparer {
  textToSpeech(text: string, signal?: AbortSignal): Promise<string>
  normalizeVoiceMessage(data: Buffer, signal?: AbortSignal): Promise<string>
  storeAudioFile(data: Buffer, extension: string, signal?: AbortSignal): Promise<string>
}

export interface SpeechOptions {
  audioDir: string
  voice: string
  rate: number
  ffmpegPath: string
  run?: CommandRunner
}

function isMissingBinary(error: unknown): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}

function commandFailure(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
    return error.stderr.trim().split('\n').slice(-3).join(' | ')
  }
  return errorMessage(error)
}

async function removeQuietly(...paths: string[]): Promise<void> {
  await Promise.all(paths.map(path => unlink(path).catch((error: unknown) => {
    if (!isMissingBinary(error)) {
      logger.debug({ path, error: errorMessage(error) }, 'Failed to remove temp file')
    }
  })))
}

export class SpeechSynthesizer implements AudioPreparer {
  private run: CommandRunner

  constructor(private options: SpeechOptions) {
    this.run = options.run ?? runCommand
  }

  async textToSpeech(text: string, signal?: AbortSignal): Promise<string> {
    const trimmed = text.trim()
    if (!trimmed) {
      throw new PrepError('Nothing to say')
    }

    const base = await this.tempBase('tts')
    const aiffPath = `${base}.aiff`
    const mp3Path = `${base}.mp3`

    logger.info({ chars: trimmed.length, preview: trimmed.slice(0, 30), voice: this.options.voice }, 'Synthesizing speech')

    try {
      await this.step('say', ['-v', this.options.voice, '-r', String(this.options.rate), '-o', aiffPath, trimmed], signal)
      await this.step(this.options.ffmpegPath, ['-y', '-i', aiffPath, '-acodec', 'libmp3lame', '-b:a', '128k', mp3Path], signal)
      await this.checkOutput(mp3Path)
    } catch (error) {
      await removeQuietly(mp3Path)
      throw error
    } finally {
      await removeQuietly(aiffPath)
    }

    return mp3Path
  }

  async normalizeVoiceMessage(data: Buffer, signal?: AbortSignal): Promise<string> {
    const base = await this.tempBase('voice')
    const oggPath = `${base}.ogg`
    const mp3Path = `${base}.mp3`

    await this.write(oggPath, data)

    try {
      throwIfAborted(signal)
      await this.run(this.options.ffmpegPath, ['-y', '-i', oggPath, '-acodec', 'libmp3lame', mp3Path], { signal })
    } catch (error) {
      if (signal?.aborted) {
        await removeQuietly(oggPath, mp3Path)
        throw abortReason(signal)
      }
      if (isMissingBinary(error)) {
        logger.warn({ ffmpeg: this.options.ffmpegPath }, 'ffmpeg not found, playing OGG directly')
        await this.checkOutput(oggPath)
        return oggPath
      }
      await removeQuietly(oggPath, mp3Path)
      throw new PrepError(`Voice conversion failed: ${commandFailure(error)}`, error)
    }

    await removeQuietly(oggPath)
    try {
      await this.checkOutput(mp3Path)
    } catch (error) {
      await removeQuietly(mp3Path)
      throw error
    }
    return mp3Path
  }

  async storeAudioFile(data: Buffer, extension: string, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal)
    const ext = /^\.?[a-z0-9]{1,5}$/i.test(extension)
      ? `.${extension.replace(/^\./, '').toLowerCase()}`
      : '.mp3'
    const path = `${await this.tempBase('audio')}${ext}`

    await this.write(path, data)
    try {
      await this.checkOutput(path)
    } catch (error) {
      await removeQuietly(path)
      throw error
    }
    return path
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async tempBase(prefix: string): Promise<string> {
    try {
      await mkdir(this.options.audioDir, { recursive: true })
    } catch (error) {
      throw new PrepError(`Cannot create audio directory ${this.options.audioDir}: ${errorMessage(error)}`, error)
    }
    return join(this.options.audioDir, `${prefix}-${randomUUID()}`)
  }

  private async write(path: string, data: Buffer): Promise<void> {
    try {
      await writeFile(path, data)
    } catch (error) {
      throw new PrepError(`Cannot write ${path}: ${errorMessage(error)}`, error)
    }
  }

  private async step(file: string, args: string[], signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal)
    try {
      await this.run(file, args, { signal })
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal)
      }
      if (isMissingBinary(error)) {
        throw new PrepError(`Required tool not found: ${file}`, error)
      }
      throw new PrepError(`${file} failed: ${commandFailure(error)}`, error)
    }
  }

  private async checkOutput(path: string): Promise<void> {
    let size: number
    try {
      size = (await stat(path)).size
    } catch (error) {
      throw new PrepError(`Audio file not created: ${path}`, error)
    }
    if (size < MIN_AUDIO_BYTES) {
      throw new PrepError(`Audio file too small: ${size} bytes`)
    }
    logger.debug({ path, size }, 'Audio file ready')
  }
}
