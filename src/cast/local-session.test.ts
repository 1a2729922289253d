import { describe, it, expect } from 'vitest'
import type { SpawnOptions } from 'child_process'
import { DeviceBusyError, PlaybackError } from '../types.js'
import { FakeChild, LOCAL_DEVICE } from '../testing/fakes.js'
import { LocalSession } from './local-session.js'

function setup() {
  const spawned: { command: string; args: string[]; child: FakeChild }[] = []
  const session = new LocalSession({
    player: { command: 'afplay', args: ['-q', '1'] },
    spawn: (command: string, args: string[], _options: SpawnOptions) => {
      const child = new FakeChild()
      spawned.push({ command, args, child })
      return child
    },
  })
  return { session, spawned }
}

describe('LocalSession', () => {
  it('connects instantly and never needs the audio server', async () => {
    const { session } = setup()
    await session.connect(LOCAL_DEVICE)
    expect(session.isConnected(LOCAL_DEVICE)).toBe(true)
    expect(session.requiresAudioServer).toBe(false)
  })

  it('refuses to play before connect', async () => {
    const { session } = setup()
    await expect(session.play('/tmp/a.mp3')).rejects.toBeInstanceOf(PlaybackError)
  })

  it('spawns the player with the file path appended', async () => {
    const { session, spawned } = setup()
    await session.connect(LOCAL_DEVICE)
    await session.play('/tmp/a.mp3')

    expect(spawned[0]?.command).toBe('afplay')
    expect(spawned[0]?.args).toEqual(['-q', '1', '/tmp/a.mp3'])
    expect(session.status().state).toBe('playing')
  })

  it('reports FINISHED when the player exits cleanly', async () => {
    const { session, spawned } = setup()
    await session.connect(LOCAL_DEVICE)
    await session.play('/tmp/a.mp3')
    spawned[0]?.child.finish(0)

    expect(session.status()).toEqual({ state: 'idle', idleReason: 'FINISHED' })
  })

  it('reports an error on a non-zero exit', async () => {
    const { session, spawned } = setup()
    await session.connect(LOCAL_DEVICE)
    await session.play('/tmp/a.mp3')
    spawned[0]?.child.finish(1)

    expect(session.status()).toEqual({ state: 'error', idleReason: 'ERROR' })
  })

  it('is busy while a player is running', async () => {
    const { session } = setup()
    await session.connect(LOCAL_DEVICE)
    await session.play('/tmp/a.mp3')
    await expect(session.play('/tmp/b.mp3')).rejects.toBeInstanceOf(DeviceBusyError)
  })

  it('kills the player on stop and allows a new play', async () => {
    const { session, spawned } = setup()
    await session.connect(LOCAL_DEVICE)
    await session.play('/tmp/a.mp3')
    await session.stop()

    expect(spawned[0]?.child.killedWith).toBe('SIGTERM')
    expect(session.status()).toEqual({ state: 'idle', idleReason: 'CANCELLED' })

    await session.play('/tmp/b.mp3')
    expect(spawned).toHaveLength(2)
  })

  it('reports a spawn failure as an error status', async () => {
    const { session, spawned } = setup()
    await session.connect(LOCAL_DEVICE)
    await session.play('/tmp/a.mp3')
    spawned[0]?.child.emit('error', new Error('spawn afplay ENOENT'))

    expect(session.status().state).toBe('error')
  })
})
