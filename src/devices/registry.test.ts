import { describe, it, expect } from 'vitest'
import {
  DeviceRegistry,
  LOCAL_DEVICE,
  announcementToDevice,
  formatCastId,
  type CastAnnouncement,
  type CastBrowser,
} from './registry.js'

const LIVING_ROOM: CastAnnouncement = {
  name: 'Google-Home-abc',
  host: 'abc.local',
  addresses: ['fe80::1', '192.168.1.41'],
  txt: { id: '8c1e0f4a00004000800000000000000a', fn: 'Living Room' },
}

const KITCHEN: CastAnnouncement = {
  name: 'Google-Nest-def',
  host: 'def.local',
  addresses: ['192.168.1.42'],
  txt: { id: Buffer.from('8c1e0f4a00004000800000000000000b'), fn: 'Kitchen' },
}

/** Browser that announces the given services immediately (twice, like real mDNS) */
function fakeBrowser(announcements: CastAnnouncement[], stopped: { count: number }): CastBrowser {
  return (onFound) => {
    for (const a of announcements) {
      onFound(a)
      onFound(a)
    }
    return { stop: () => { stopped.count++ } }
  }
}

describe('formatCastId', () => {
  it('dashes a bare 32-char hex id', () => {
    expect(formatCastId('8C1E0F4A00004000800000000000000A')).toBe('8c1e0f4a-0000-4000-8000-00000000000a')
  })

  it('leaves other ids untouched', () => {
    expect(formatCastId('not-a-uuid')).toBe('not-a-uuid')
  })
})

describe('announcementToDevice', () => {
  it('prefers the IPv4 address and friendly name', () => {
    expect(announcementToDevice(LIVING_ROOM)).toEqual({
      id: '8c1e0f4a-0000-4000-8000-00000000000a',
      name: 'Living Room',
      address: '192.168.1.41',
      deviceType: 'googlecast',
    })
  })

  it('falls back to service name and host without TXT data', () => {
    expect(announcementToDevice({ name: 'Speaker', host: 'speaker.local' })).toEqual({
      id: 'Speaker',
      name: 'Speaker',
      address: 'speaker.local',
      deviceType: 'googlecast',
    })
  })
})

describe('DeviceRegistry', () => {
  it('deduplicates, sorts by name and stops browsing', async () => {
    const stopped = { count: 0 }
    const registry = new DeviceRegistry({ browse: fakeBrowser([LIVING_ROOM, KITCHEN], stopped), includeLocal: false })

    const devices = await registry.discover(10)

    expect(devices.map(d => d.name)).toEqual(['Kitchen', 'Living Room'])
    expect(stopped.count).toBe(1)
  })

  it('lists the local device first when enabled', async () => {
    const registry = new DeviceRegistry({ browse: fakeBrowser([KITCHEN], { count: 0 }), includeLocal: true })
    const devices = await registry.discover(10)
    expect(devices[0]).toEqual(LOCAL_DEVICE)
    expect(devices).toHaveLength(2)
  })

  it('locates a device by id before the timeout', async () => {
    const stopped = { count: 0 }
    const registry = new DeviceRegistry({ browse: fakeBrowser([LIVING_ROOM, KITCHEN], stopped), includeLocal: false })

    const started = Date.now()
    const device = await registry.locate('8c1e0f4a-0000-4000-8000-00000000000b', 5_000)

    expect(device?.name).toBe('Kitchen')
    expect(Date.now() - started).toBeLessThan(1_000)
    expect(stopped.count).toBe(1)
  })

  it('returns null when the device never shows up', async () => {
    const registry = new DeviceRegistry({ browse: fakeBrowser([], { count: 0 }), includeLocal: false })
    expect(await registry.locate('missing', 20)).toBeNull()
  })
})
