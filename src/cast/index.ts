/**
 * Cast Module
 *
 * Session implementations per device type.
 */

import type { PlayerCommand } from '../config/app-config.js'
import type { DeviceType } from '../types.js'
import { GoogleCastSession, type GoogleCastSessionOptions } from './googlecast-session.js'
import { LocalSession, type SpawnFn } from './local-session.js'
import type { CastSession } from './session.js'

export { GoogleCastSession, createCastv2Client, toMediaStatus } from './googlecast-session.js'
export { LocalSession } from './local-session.js'
export { IDLE_STATUS, progressOf } from './session.js'

export type { CastClient, MediaReceiver, GoogleCastSessionOptions } from './googlecast-session.js'
export type { SpawnFn } from './local-session.js'
export type { CastSession, MediaStatus, TransportState, IdleReason } from './session.js'

export interface CastSessionFactoryOptions {
  googlecast?: GoogleCastSessionOptions
  player: PlayerCommand
  spawn?: SpawnFn
}

export type CastSessionFactory = (deviceType: DeviceType) => CastSession

export function createCastSessionFactory(options: CastSessionFactoryOptions): CastSessionFactory {
  return (deviceType) => {
    switch (deviceType) {
      case 'googlecast':
        return new GoogleCastSession(options.googlecast)
      case 'macos_say':
        return new LocalSession({ player: options.player, spawn: options.spawn })
    }
  }
}
