import { describe, it, expect, afterEach } from 'vitest'
import { access, mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { MemoryDeviceStore } from '../config/device-store.js'
import { AudioServer } from '../server/audio-server.js'
import { CAST_DEVICE, FakeAudioEndpoint, FakeCastSession, FakePreparer, LOCAL_DEVICE, OTHER_CAST_DEVICE, waitFor } from '../testing/fakes.js'
import { ConnectionError, DeviceBusyError, type Device } from '../types.js'
import { sleep } from '../utils/retry.js'
import type { PlaybackEvent } from './events.js'
import { PlaybackOrchestrator, captionOf, type PlaybackOrchestratorOptions } from './orchestrator.js'

const dirs: string[] = []

afterEach(async () => {
  await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })))
})

interface SetupOptions {
  device?: Device | null
  configure?: (cast: FakeCastSession) => void
  overrides?: Partial<PlaybackOrchestratorOptions>
}

async function setup(options: SetupOptions = {}) {
  const dir = await mkdtemp(join(tmpdir(), 'orchestrator-test-'))
  dirs.push(dir)

  const preparer = new FakePreparer(dir)
  const store = new MemoryDeviceStore(options.device ?? null)
  const casts: FakeCastSession[] = []
  const servers: FakeAudioEndpoint[] = []

  const orchestrator = new PlaybackOrchestrator({
    preparer,
    deviceStore: store,
    createCastSession: (deviceType) => {
      const cast = new FakeCastSession(deviceType)
      options.configure?.(cast)
      casts.push(cast)
      return cast
    },
    createAudioServer: () => {
      const server = new FakeAudioEndpoint()
      servers.push(server)
      return server
    },
    connectTimeoutMs: 50,
    pollIntervalMs: 10,
    idleGraceMs: 50,
    ...options.overrides,
  })

  return { orchestrator, preparer, store, casts, servers }
}

function recorder() {
  const events: PlaybackEvent[] = []
  return {
    events,
    onProgress: (event: PlaybackEvent) => {
      events.push(event)
    },
    types: () => [...new Set(events.map((e) => e.type))],
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

describe('captionOf', () => {
  it('describes each input kind', () => {
    expect(captionOf({ kind: 'text', text: '你好' })).toBe('你好')
    expect(captionOf({ kind: 'voice', load: async () => Buffer.alloc(0) })).toBe('Voice message')
    expect(captionOf({ kind: 'audio', load: async () => Buffer.alloc(0), extension: '.m4a' })).toBe('Audio file (m4a)')
  })
})

describe('PlaybackOrchestrator.play', () => {
  it('reports a connection error without running TTS when no device is selected', async () => {
    const { orchestrator, preparer, casts } = await setup()
    const { events, onProgress } = recorder()

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: '你好' }, onProgress)

    expect(outcome.state).toBe('error')
    expect(events).toHaveLength(1)
    expect(events[0]).toMatchObject({ type: 'error', kind: 'connection' })
    expect(preparer.calls).toEqual([])
    expect(casts).toHaveLength(0)
  })

  it('plays on a local device without the audio server', async () => {
    const { orchestrator, preparer, casts, servers } = await setup({ device: LOCAL_DEVICE })
    const { events, onProgress, types } = recorder()

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: '你好' }, onProgress)

    expect(outcome.state).toBe('complete')
    expect(types()).toEqual(['preparing', 'playing', 'complete'])
    expect(events[1]).toMatchObject({ type: 'playing', status: 'playing', progress: 0 })
    expect(servers).toHaveLength(0)
    expect(casts[0]?.plays).toEqual([preparer.files[0]])
    expect(await exists(preparer.files[0] ?? '')).toBe(false)
  })

  it('connects, serves and plays on a cast device', async () => {
    const { orchestrator, preparer, casts, servers } = await setup({ device: CAST_DEVICE })
    const { events, onProgress, types } = recorder()

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: 'hello' }, onProgress)

    expect(outcome.state).toBe('complete')
    expect(types()).toEqual(['preparing', 'connecting', 'serving', 'playing', 'complete'])
    expect(events.find((e) => e.type === 'serving')).toMatchObject({ url: 'http://192.168.1.2:8000/audio/1.mp3' })
    expect(casts[0]?.connects).toEqual([CAST_DEVICE])
    expect(casts[0]?.plays).toEqual(['http://192.168.1.2:8000/audio/1.mp3'])
    expect(servers[0]?.started).toEqual([preparer.files[0]])
    expect(servers[0]?.running).toBe(false)
    expect(await exists(preparer.files[0] ?? '')).toBe(false)
  })

  it('reuses an open connection for the next request', async () => {
    const { orchestrator, casts } = await setup({ device: CAST_DEVICE })

    await orchestrator.play('chat-1', { kind: 'text', text: 'one' }, () => {})
    const { onProgress, types } = recorder()
    await orchestrator.play('chat-1', { kind: 'text', text: 'two' }, onProgress)

    expect(casts).toHaveLength(1)
    expect(casts[0]?.connects).toHaveLength(1)
    expect(types()).toEqual(['preparing', 'serving', 'playing', 'complete'])
  })

  it('loads voice and audio attachments before preparing them', async () => {
    const { orchestrator, preparer, servers } = await setup({ device: CAST_DEVICE })

    await orchestrator.play('chat-1', { kind: 'voice', load: async () => Buffer.from('ogg-bytes') }, () => {})
    await orchestrator.play('chat-1', { kind: 'audio', load: async () => Buffer.from('m4a-bytes'), extension: '.m4a' }, () => {})

    expect(preparer.calls).toEqual([
      { kind: 'voice', content: 'ogg-bytes' },
      { kind: 'audio', content: 'm4a-bytes' },
    ])
    expect(servers[0]?.started[1]).toMatch(/audio-1\.m4a$/)
  })

  it('cancels the playback in flight before preparing the next one', async () => {
    const { orchestrator, casts, servers } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.autoFinishMs = null
      },
    })
    const log: string[] = []
    let seenAtPrepare: { serverRunning: boolean; deviceStops: number } | null = null

    const first = orchestrator.play('chat-1', { kind: 'text', text: 'first' }, (e) => {
      log.push(`first:${e.type}`)
    })
    await waitFor(() => log.includes('first:playing'))

    const second = orchestrator.play('chat-1', { kind: 'voice', load: async () => Buffer.from('ogg') }, (e) => {
      log.push(`second:${e.type}`)
      if (e.type === 'preparing') {
        seenAtPrepare = { serverRunning: servers[0]?.running ?? true, deviceStops: casts[0]?.stops ?? 0 }
      }
    })

    expect((await first).state).toBe('cancelled')
    await waitFor(() => log.includes('second:playing'))
    casts[0]?.finish()
    expect((await second).state).toBe('complete')

    expect(seenAtPrepare).toEqual({ serverRunning: false, deviceStops: 1 })
    expect(log.filter((l) => l.startsWith('first:')).at(-1)).toBe('first:playing')
    expect(log.indexOf('second:preparing')).toBeGreaterThan(log.lastIndexOf('first:playing'))
    expect(casts[0]?.plays).toHaveLength(2)
  })

  it('lets only the newest of several overlapping requests play', async () => {
    const { orchestrator, preparer } = await setup({ device: LOCAL_DEVICE })
    preparer.delayMs = 20

    const outcomes = await Promise.all([
      orchestrator.play('chat-1', { kind: 'text', text: 'a' }, () => {}),
      orchestrator.play('chat-1', { kind: 'text', text: 'b' }, () => {}),
      orchestrator.play('chat-1', { kind: 'text', text: 'c' }, () => {}),
    ])

    expect(outcomes.map((o) => o.state)).toEqual(['cancelled', 'cancelled', 'complete'])
  })

  it('fails with a connection error when the device does not answer in time', async () => {
    const { orchestrator, preparer, casts } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.connectDelayMs = 1_000
      },
    })
    const { events, onProgress, types } = recorder()

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, onProgress)

    expect(outcome.state).toBe('error')
    expect(types()).toEqual(['preparing', 'connecting', 'error'])
    expect(events.at(-1)).toMatchObject({ kind: 'connection' })
    expect(events.at(-1)).toHaveProperty('message', expect.stringMatching(/^Timed out connecting to Living Room/))
    expect(await exists(preparer.files[0] ?? '')).toBe(false)

    const status = await orchestrator.getStatus('chat-1')
    expect(status.state).toBe('idle')
    expect(status.device).toEqual(CAST_DEVICE)
    expect(status.lastOutcome?.state).toBe('error')

    const cast = casts[0]
    if (!cast) throw new Error('no cast session')
    cast.connectDelayMs = 0
    await expect(orchestrator.connect('chat-1')).resolves.toBe('connected')
    expect(cast.connects).toHaveLength(2)
  })

  it('reports prep failures and never touches the device', async () => {
    const { orchestrator, preparer, casts } = await setup({ device: CAST_DEVICE })
    preparer.error = new Error('say exited with code 1')
    const { events, onProgress } = recorder()

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, onProgress)

    expect(outcome.state).toBe('error')
    expect(events.map((e) => e.type)).toEqual(['preparing', 'error'])
    expect(events[1]).toMatchObject({ kind: 'prep', message: 'Could not prepare audio: say exited with code 1' })
    expect(casts).toHaveLength(0)
  })

  it('reports a failed attachment download as a prep error', async () => {
    const { orchestrator } = await setup({ device: CAST_DEVICE })
    const { events, onProgress } = recorder()

    await orchestrator.play('chat-1', { kind: 'voice', load: async () => { throw new Error('HTTP 404') } }, onProgress)

    expect(events.at(-1)).toMatchObject({ type: 'error', kind: 'prep', message: 'Could not prepare audio: HTTP 404' })
  })

  it('drops the connection when the device reports an error mid-playback', async () => {
    const { orchestrator, casts, servers } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.autoFinishMs = null
      },
    })
    const { events, onProgress } = recorder()

    const done = orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, onProgress)
    await waitFor(() => events.some((e) => e.type === 'playing'))
    casts[0]?.fail()
    const outcome = await done

    expect(outcome.state).toBe('error')
    expect(events.at(-1)).toMatchObject({ type: 'error', kind: 'playback', message: 'Playback failed on Living Room' })
    expect(casts[0]?.disconnects).toBe(1)
    expect(servers[0]?.running).toBe(false)
  })

  it('keeps the connection when the device is busy', async () => {
    const { orchestrator, casts } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.playError = new DeviceBusyError('Device refused playback: busy')
      },
    })
    const { events, onProgress } = recorder()

    await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, onProgress)

    expect(events.at(-1)).toMatchObject({ type: 'error', kind: 'device_busy' })
    expect(casts[0]?.disconnects).toBe(0)
    expect(casts[0]?.isConnected(CAST_DEVICE)).toBe(true)
  })

  it('treats idle without a reason as finished after the grace period', async () => {
    const { orchestrator } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.autoFinishMs = null
        cast.playStatus = { state: 'idle' }
      },
    })

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, () => {})
    expect(outcome.state).toBe('complete')
  })

  it('fails when the media is stopped on the device before it played', async () => {
    const { orchestrator } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.autoFinishMs = null
        cast.playStatus = { state: 'idle', idleReason: 'CANCELLED' }
      },
    })
    const { events, onProgress } = recorder()

    await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, onProgress)
    expect(events.at(-1)).toMatchObject({ type: 'error', kind: 'playback', message: 'Playback was stopped on Living Room' })
  })

  it('delivers events one at a time in order', async () => {
    const { orchestrator } = await setup({ device: CAST_DEVICE })
    const seen: string[] = []
    let inFlight = 0
    let maxInFlight = 0

    await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, async (event) => {
      inFlight++
      maxInFlight = Math.max(maxInFlight, inFlight)
      await sleep(5)
      seen.push(event.type)
      inFlight--
    })

    expect(maxInFlight).toBe(1)
    expect([...new Set(seen)]).toEqual(['preparing', 'connecting', 'serving', 'playing', 'complete'])
    expect(seen.at(-1)).toBe('complete')
  })

  it('does not hold the next request behind a hung callback of the cancelled one', async () => {
    const { orchestrator, casts } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.autoFinishMs = null
      },
    })
    let hung = false
    const first = orchestrator.play('chat-1', { kind: 'text', text: 'first' }, (event) => {
      if (event.type === 'playing') {
        hung = true
        return new Promise<void>(() => {})
      }
    })
    await waitFor(() => hung)

    const { onProgress, types } = recorder()
    const second = orchestrator.play('chat-1', { kind: 'text', text: 'second' }, onProgress)

    expect((await first).state).toBe('cancelled')
    await waitFor(() => types().includes('playing'))
    casts[0]?.finish()

    expect((await second).state).toBe('complete')
    expect(types()).toEqual(['preparing', 'serving', 'playing', 'complete'])
  })

  it('reports a server error when the audio server cannot bind, and cleans up', async () => {
    const { orchestrator, preparer, casts } = await setup({
      device: CAST_DEVICE,
      overrides: {
        // Documentation range (RFC 5737), never a local interface
        createAudioServer: () => new AudioServer({ bindHost: '203.0.113.7', advertiseHost: '127.0.0.1' }),
      },
    })
    const { events, onProgress } = recorder()

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: 'hello' }, onProgress)

    expect(outcome).toMatchObject({ state: 'error', error: { kind: 'server' } })
    expect(events.at(-1)).toMatchObject({ type: 'error', kind: 'server' })
    expect(casts[0]?.plays).toEqual([])
    expect(casts[0]?.disconnects).toBe(0)
    expect(await exists(preparer.files[0] ?? '')).toBe(false)

    const status = await orchestrator.getStatus('chat-1')
    expect(status.state).toBe('idle')
    expect(status.lastOutcome).toMatchObject({ state: 'error', error: { kind: 'server' } })
  })

  it('completes even when the progress callback throws', async () => {
    const { orchestrator } = await setup({ device: LOCAL_DEVICE })
    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, () => {
      throw new Error('message edit failed')
    })
    expect(outcome.state).toBe('complete')
  })

  it('keeps sessions of different chats apart', async () => {
    const { orchestrator, casts, servers } = await setup({ device: CAST_DEVICE })

    const outcomes = await Promise.all([
      orchestrator.play('chat-1', { kind: 'text', text: 'one' }, () => {}),
      orchestrator.play('chat-2', { kind: 'text', text: 'two' }, () => {}),
    ])

    expect(outcomes.map((o) => o.state)).toEqual(['complete', 'complete'])
    expect(casts).toHaveLength(2)
    expect(servers).toHaveLength(2)
  })
})

describe('PlaybackOrchestrator.connect', () => {
  it('is idempotent for the selected device', async () => {
    const { orchestrator, casts } = await setup({ device: CAST_DEVICE })

    await expect(orchestrator.connect('chat-1')).resolves.toBe('connected')
    await expect(orchestrator.connect('chat-1')).resolves.toBe('already_connected')
    expect(casts[0]?.connects).toHaveLength(1)
    expect((await orchestrator.getStatus('chat-1')).connected).toBe(true)
  })

  it('reports local devices', async () => {
    const { orchestrator } = await setup({ device: LOCAL_DEVICE })
    await expect(orchestrator.connect('chat-1')).resolves.toBe('local')
  })

  it('requires a selected device', async () => {
    const { orchestrator } = await setup()
    await expect(orchestrator.connect('chat-1')).rejects.toBeInstanceOf(ConnectionError)
  })

  it('wraps connect failures in ConnectionError', async () => {
    const { orchestrator, casts } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.connectError = new Error('EHOSTUNREACH')
      },
    })

    await expect(orchestrator.connect('chat-1')).rejects.toThrow('Could not connect to Living Room: EHOSTUNREACH')
    expect(casts[0]?.disconnects).toBe(1)
  })
})

describe('PlaybackOrchestrator sessions', () => {
  it('persists the selected device and drops a connection to another one', async () => {
    const { orchestrator, store, casts } = await setup({ device: CAST_DEVICE })
    await orchestrator.connect('chat-1')

    await orchestrator.selectDevice('chat-1', OTHER_CAST_DEVICE)

    expect(await store.load()).toEqual(OTHER_CAST_DEVICE)
    expect(casts[0]?.disconnects).toBe(1)
    const status = await orchestrator.getStatus('chat-1')
    expect(status.device).toEqual(OTHER_CAST_DEVICE)
    expect(status.connected).toBe(false)
    expect((await orchestrator.getStatus('chat-2')).device).toEqual(OTHER_CAST_DEVICE)
  })

  it('switches session kind when a local device is selected', async () => {
    const { orchestrator, casts } = await setup({ device: CAST_DEVICE })
    await orchestrator.connect('chat-1')
    await orchestrator.selectDevice('chat-1', LOCAL_DEVICE)

    const outcome = await orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, () => {})

    expect(outcome.state).toBe('complete')
    expect(casts.map((c) => c.deviceType)).toEqual(['googlecast', 'macos_say'])
  })

  it('cancels on request and stops the device', async () => {
    const { orchestrator, casts } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.autoFinishMs = null
      },
    })
    const { events, onProgress } = recorder()

    const done = orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, onProgress)
    await waitFor(() => events.some((e) => e.type === 'playing'))

    await expect(orchestrator.cancel('chat-1')).resolves.toBe(true)
    expect((await done).state).toBe('cancelled')
    expect(casts[0]?.stops).toBe(1)
    expect(events.some((e) => e.type === 'complete' || e.type === 'error')).toBe(false)
    await expect(orchestrator.cancel('chat-1')).resolves.toBe(false)
    await expect(orchestrator.cancel('unknown')).resolves.toBe(false)
  })

  it('expires idle sessions and releases their connection', async () => {
    let clock = 0
    const { orchestrator, casts } = await setup({
      device: CAST_DEVICE,
      overrides: { sessionIdleMs: 1_000, now: () => clock },
    })
    await orchestrator.connect('chat-1')

    clock = 5_000
    await orchestrator.getStatus('chat-2')

    expect(orchestrator.sessionCount).toBe(1)
    expect(casts[0]?.disconnects).toBe(1)
  })

  it('shuts down every session', async () => {
    const { orchestrator, casts } = await setup({
      device: CAST_DEVICE,
      configure: (cast) => {
        cast.autoFinishMs = null
      },
    })
    const { events, onProgress } = recorder()

    const done = orchestrator.play('chat-1', { kind: 'text', text: 'hi' }, onProgress)
    await waitFor(() => events.some((e) => e.type === 'playing'))
    await orchestrator.shutdown()

    expect((await done).state).toBe('cancelled')
    expect(casts[0]?.disconnects).toBe(1)
    expect(orchestrator.sessionCount).toBe(0)
  })
})
