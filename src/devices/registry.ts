/**
 * Device Registry
 *
 * Finds playback targets: Google Cast receivers announced over mDNS
 * (_googlecast._tcp), plus the local "say" output when running on macOS.
 */

import { platform } from 'os'
import { Bonjour, type Service } from 'bonjour-service'
import type { Device } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { sleep } from '../utils/retry.js'

const logger = createLogger({ module: 'device-registry' })

export const LOCAL_DEVICE: Device = {
  id: 'macos_say',
  name: 'macOS Say (Local)',
  address: null,
  deviceType: 'macos_say',
}

/** The subset of an mDNS announcement we read */
export interface CastAnnouncement {
  name: string
  host: string
  addresses?: string[]
  txt?: unknown
}

export interface BrowseHandle {
  stop(): void
}

/** Start browsing for cast announcements; onFound may fire many times per device */
export type CastBrowser = (onFound: (announcement: CastAnnouncement) => void) => BrowseHandle

export interface DeviceRegistryOptions {
  browse?: CastBrowser
  includeLocal?: boolean
}

export function bonjourCastBrowser(): CastBrowser {
  return (onFound) => {
    const bonjour = new Bonjour()
    const browser = bonjour.find({ type: 'googlecast' }, (service: Service) => {
      onFound({
        name: service.name,
        host: service.host,
        addresses: service.addresses,
        txt: service.txt,
      })
    })
    return {
      stop() {
        browser.stop()
        bonjour.destroy()
      },
    }
  }
}

function txtValue(txt: unknown, key: string): string | undefined {
  if (!txt || typeof txt !== 'object') {
    return undefined
  }
  const value: unknown = Reflect.get(txt, key)
  if (typeof value === 'string') {
    return value
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf-8')
  }
  return undefined
}

/** Cast TXT ids are bare hex; present them in dashed UUID form */
export function formatCastId(raw: string): string {
  const hex = raw.replace(/-/g, '').toLowerCase()
  if (!/^[0-9a-f]{32}$/.test(hex)) {
    return raw
  }
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`
}

export function announcementToDevice(announcement: CastAnnouncement): Device {
  const rawId = txtValue(announcement.txt, 'id')
  const friendlyName = txtValue(announcement.txt, 'fn')
  const ipv4 = announcement.addresses?.find(a => /^\d+\.\d+\.\d+\.\d+$/.test(a))

  return {
    id: rawId ? formatCastId(rawId) : announcement.name,
    name: friendlyName || announcement.name,
    address: ipv4 ?? announcement.addresses?.[0] ?? announcement.host,
    deviceType: 'googlecast',
  }
}

export class DeviceRegistry {
  private browse: CastBrowser
  private includeLocal: boolean

  constructor(options: DeviceRegistryOptions = {}) {
    this.browse = options.browse ?? bonjourCastBrowser()
    this.includeLocal = options.includeLocal ?? platform() === 'darwin'
  }

  /**
   * Scan the network for timeoutMs and return every device seen
   */
  async discover(timeoutMs: number, signal?: AbortSignal): Promise<Device[]> {
    logger.info({ timeoutMs }, 'Scanning for Google Cast devices')

    const found = new Map<string, Device>()
    const handle = this.browse((announcement) => {
      const device = announcementToDevice(announcement)
      if (!found.has(device.id)) {
        logger.debug({ deviceId: device.id, name: device.name, address: device.address }, 'Found cast device')
      }
      found.set(device.id, device)
    })

    try {
      await sleep(timeoutMs, signal)
    } finally {
      handle.stop()
    }

    const devices: Device[] = []
    if (this.includeLocal) {
      devices.push(LOCAL_DEVICE)
    }
    devices.push(...Array.from(found.values()).sort((a, b) => a.name.localeCompare(b.name)))

    logger.info({ castDevices: found.size, total: devices.length }, 'Device scan finished')
    return devices
  }

  /**
   * Look up one device by id, resolving as soon as it is announced
   */
  async locate(deviceId: string, timeoutMs: number, signal?: AbortSignal): Promise<Device | null> {
    if (deviceId === LOCAL_DEVICE.id) {
      return this.includeLocal ? LOCAL_DEVICE : null
    }

    let resolveFound: (device: Device) => void = () => {}
    const foundPromise = new Promise<Device>((resolve) => {
      resolveFound = resolve
    })

    // Ends the wait early once the device shows up
    const waiting = new AbortController()
    const forwardAbort = () => waiting.abort(signal?.reason)
    signal?.addEventListener('abort', forwardAbort, { once: true })

    const handle = this.browse((announcement) => {
      const device = announcementToDevice(announcement)
      if (device.id === deviceId) {
        resolveFound(device)
      }
    })

    try {
      return await Promise.race([foundPromise, sleep(timeoutMs, waiting.signal).then(() => null)])
    } finally {
      handle.stop()
      signal?.removeEventListener('abort', forwardAbort)
      waiting.abort()
    }
  }
}
