/**
 * Audio Server
 *
 * Short-lived HTTP server that exposes exactly one prepared audio file to
 * a cast device. Each served file gets a random path token; every other
 * path is a 404. The listener shuts itself down after idleTimeoutMs
 * without a request, and on stop().
 */

import { createReadStream, type ReadStream } from 'fs'
import { stat } from 'fs/promises'
import { pipeline } from 'stream'
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http'
import type { Socket } from 'net'
import { extname } from 'path'
import { randomUUID } from 'crypto'
import { ServerError, errorMessage } from '../types.js'
import { audioContentType } from '../utils/audio-format.js'
import { createLogger } from '../utils/logger.js'
import { getLocalIp } from '../utils/network.js'

const logger = createLogger({ module: 'audio-server' })

export interface AudioServerOptions {
  /** Interface to bind (default: all interfaces, so LAN devices can reach it) */
  bindHost?: string
  /** Host put in the returned URL (default: first external IPv4) */
  advertiseHost?: string
  idleTimeoutMs?: number
}

interface ServedFile {
  path: string
  size: number
  urlPath: string
  contentType: string
}

type ByteRange = { start: number; end: number }

/**
 * Parse a single "bytes=" range against a file size.
 * Returns null for unsatisfiable ranges, undefined for no/ignored header.
 */
export function parseRange(header: string | undefined, size: number): ByteRange | null | undefined {
  if (!header) {
    return undefined
  }
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim())
  if (!match) {
    return undefined  // multi-range or malformed: serve the whole file
  }

  const [, startText = '', endText = ''] = match
  if (!startText && !endText) {
    return undefined
  }

  let start: number
  let end: number
  if (!startText) {
    // suffix range: last N bytes
    const suffix = Number(endText)
    if (suffix === 0) {
      return null
    }
    start = Math.max(0, size - suffix)
    end = size - 1
  } else {
    start = Number(startText)
    end = endText ? Math.min(Number(endText), size - 1) : size - 1
  }

  if (start >= size || start > end) {
    return null
  }
  return { start, end }
}

export class AudioServer {
  private server: Server | null = null
  private file: ServedFile | null = null
  private sockets = new Set<Socket>()
  private readers = new Set<ReadStream>()
  private idleTimer: NodeJS.Timeout | null = null
  private boundPort: number | null = null
  private fetches = 0

  private bindHost: string
  private idleTimeoutMs: number

  constructor(private options: AudioServerOptions = {}) {
    this.bindHost = options.bindHost ?? '0.0.0.0'
    this.idleTimeoutMs = options.idleTimeoutMs ?? 120_000
  }

  get port(): number | null {
    return this.boundPort
  }

  get isRunning(): boolean {
    return this.server !== null
  }

  /** Completed GET responses for the current file */
  get fetchCount(): number {
    return this.fetches
  }

  /** File streams still open for responses in flight */
  get openReads(): number {
    return this.readers.size
  }

  /**
   * Serve filePath and return its URL. A running server is reused only
   * while no response is in flight.
   */
  async start(filePath: string): Promise<string> {
    let size: number
    try {
      const info = await stat(filePath)
      if (!info.isFile()) {
        throw new Error('not a regular file')
      }
      size = info.size
    } catch (error) {
      throw new ServerError(`Cannot serve ${filePath}: ${errorMessage(error)}`, error)
    }

    if (this.server && this.readers.size > 0) {
      throw new ServerError('Audio server is busy serving another file')
    }

    this.file = {
      path: filePath,
      size,
      urlPath: `/audio/${randomUUID()}${extname(filePath).toLowerCase()}`,
      contentType: audioContentType(filePath),
    }
    this.fetches = 0

    if (!this.server) {
      await this.listenWithRetry()
    }
    this.resetIdleTimer()

    const host = this.options.advertiseHost ?? getLocalIp()
    const url = `http://${host}:${this.boundPort}${this.file.urlPath}`
    logger.info({ url, size, contentType: this.file.contentType }, 'Serving audio')
    return url
  }

  async stop(): Promise<void> {
    this.clearIdleTimer()
    const server = this.server
    if (!server) {
      return
    }

    const port = this.boundPort
    this.server = null
    this.boundPort = null
    this.file = null

    for (const socket of this.sockets) {
      socket.destroy()
    }
    this.sockets.clear()
    for (const reader of this.readers) {
      reader.destroy()
    }
    this.readers.clear()

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logger.debug({ error: error.message }, 'Audio server close reported an error')
        }
        resolve()
      })
    })
    logger.info({ port }, 'Audio server stopped')
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async listenWithRetry(): Promise<void> {
    try {
      await this.listen()
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Audio server bind failed, retrying on a new port')
      try {
        await this.listen()
      } catch (retryError) {
        throw new ServerError(`Could not bind audio server: ${errorMessage(retryError)}`, retryError)
      }
    }
  }

  private listen(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const server = createServer((req, res) => this.handleRequest(req, res))

      server.on('connection', (socket) => {
        this.sockets.add(socket)
        socket.on('close', () => this.sockets.delete(socket))
      })

      server.once('error', (error) => {
        server.close()
        reject(error)
      })

      server.listen(0, this.bindHost, () => {
        const address = server.address()
        if (!address || typeof address === 'string') {
          server.close()
          reject(new Error('Listener has no TCP address'))
          return
        }
        this.server = server
        this.boundPort = address.port
        server.on('error', (error) => {
          logger.error({ error: error.message }, 'Audio server error')
        })
        logger.debug({ port: this.boundPort, host: this.bindHost }, 'Audio server listening')
        resolve()
      })
    })
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const file = this.file
    const path = (req.url ?? '/').split('?', 1)[0]
    logger.debug({ method: req.method, path, range: req.headers.range, remote: req.socket.remoteAddress }, 'Audio request')

    if (!file || path !== file.urlPath) {
      res.writeHead(404, { 'Content-Type': 'text/plain' })
      res.end('Not found')
      return
    }
    // Only requests for the served file count as activity
    this.resetIdleTimer()

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.writeHead(405, { Allow: 'GET, HEAD' })
      res.end()
      return
    }

    const range = parseRange(req.headers.range, file.size)
    if (range === null) {
      res.writeHead(416, { 'Content-Range': `bytes */${file.size}` })
      res.end()
      return
    }

    const start = range?.start ?? 0
    const end = range?.end ?? file.size - 1
    const headers: Record<string, string | number> = {
      'Content-Type': file.contentType,
      'Content-Length': file.size === 0 ? 0 : end - start + 1,
      'Accept-Ranges': 'bytes',
      'Cache-Control': 'no-store',
    }
    if (range) {
      headers['Content-Range'] = `bytes ${start}-${end}/${file.size}`
    }
    res.writeHead(range ? 206 : 200, headers)

    if (req.method === 'HEAD' || file.size === 0) {
      res.end()
      return
    }

    const stream = createReadStream(file.path, { start, end })
    this.readers.add(stream)

    // pipeline destroys the file stream when the client goes away mid-body
    pipeline(stream, res, (error) => {
      this.readers.delete(stream)
      if (!error) {
        if (this.file === file) {
          this.fetches++
        }
      } else if (error.code === 'ERR_STREAM_PREMATURE_CLOSE') {
        logger.debug({ path: file.path, start, end }, 'Client closed audio request early')
      } else {
        logger.error({ error: error.message, path: file.path }, 'Failed to send audio file')
      }
      this.resetIdleTimer()
    })
  }

  private resetIdleTimer(): void {
    this.clearIdleTimer()
    if (!this.server) {
      return
    }
    this.idleTimer = setTimeout(() => {
      if (this.readers.size > 0) {
        this.resetIdleTimer()
        return
      }
      logger.info({ idleTimeoutMs: this.idleTimeoutMs, fetches: this.fetches }, 'Audio server idle, shutting down')
      this.stop().catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Failed to stop idle audio server')
      })
    }, this.idleTimeoutMs)
    this.idleTimer.unref()
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer)
      this.idleTimer = null
    }
  }
}
