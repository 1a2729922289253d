import { networkInterfaces, type NetworkInterfaceInfo } from 'os'

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>

/**
 * Pick the LAN address cast devices can reach us on: the first external IPv4.
 * Falls back to loopback when the host has no external interface.
 */
export function getLocalIp(interfaces: InterfaceTable = networkInterfaces()): string {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) {
        return entry.address
      }
    }
  }
  return '127.0.0.1'
}
