/**
 * Selected device persistence
 *
 * Stores the single selected playback device as YAML:
 *
 *   selected_device:
 *     id: 8c1e...
 *     name: Living Room speaker
 *     address: 192.168.1.40
 *     device_type: googlecast
 */

import { existsSync } from 'fs'
import { mkdir, readFile, writeFile } from 'fs/promises'
import { dirname } from 'path'
import yaml from 'js-yaml'
import { z } from 'zod'
import type { Device } from '../types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger({ module: 'device-store' })

export interface DeviceStore {
  load(): Promise<Device | null>
  save(device: Device | null): Promise<void>
}

const storedDeviceSchema = z.object({
  id: z.coerce.string(),
  name: z.string(),
  address: z.string().nullable().default(null),
  device_type: z.enum(['googlecast', 'macos_say']),
})

const storeFileSchema = z.object({
  selected_device: storedDeviceSchema.nullable().optional(),
})

type StoredDevice = z.infer<typeof storedDeviceSchema>

export function toStored(device: Device): StoredDevice {
  return {
    id: device.id,
    name: device.name,
    address: device.address,
    device_type: device.deviceType,
  }
}

export function fromStored(stored: StoredDevice): Device {
  return {
    id: stored.id,
    name: stored.name,
    address: stored.address,
    deviceType: stored.device_type,
  }
}

export class YamlDeviceStore implements DeviceStore {
  constructor(private readonly path: string) {}

  async load(): Promise<Device | null> {
    if (!existsSync(this.path)) {
      logger.debug({ path: this.path }, 'No device store found')
      return null
    }

    try {
      const raw: unknown = yaml.load(await readFile(this.path, 'utf-8')) ?? {}
      const parsed = storeFileSchema.parse(raw)
      return parsed.selected_device ? fromStored(parsed.selected_device) : null
    } catch (error) {
      logger.error({ error, path: this.path }, 'Failed to load selected device')
      return null
    }
  }

  async save(device: Device | null): Promise<void> {
    const dir = dirname(this.path)
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true })
    }

    const data = { selected_device: device ? toStored(device) : null }
    await writeFile(this.path, yaml.dump(data))
    logger.info({ deviceId: device?.id ?? null, deviceName: device?.name ?? null }, 'Saved selected device')
  }
}

/** In-memory store, used when persistence is not wanted */
export class MemoryDeviceStore implements DeviceStore {
  constructor(private device: Device | null = null) {}

  async load(): Promise<Device | null> {
    return this.device
  }

  async save(device: Device | null): Promise<void> {
    this.device = device
  }
}
