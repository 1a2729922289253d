// castv2-client ships no type declarations; this covers the surface we use.
declare module 'castv2-client' {
  import { EventEmitter } from 'events'

  namespace castv2 {
    type Callback<T> = (err: Error | null, result: T) => void

    interface MediaInfo {
      contentId: string
      contentType: string
      streamType: 'BUFFERED' | 'LIVE' | 'NONE'
      metadata?: {
        type?: number
        metadataType?: number
        title?: string
      }
    }

    interface LoadOptions {
      autoplay?: boolean
    }

    interface MediaStatus {
      playerState: 'IDLE' | 'PLAYING' | 'PAUSED' | 'BUFFERING'
      idleReason?: 'CANCELLED' | 'INTERRUPTED' | 'FINISHED' | 'ERROR'
      currentTime?: number
      media?: { duration?: number }
    }

    class DefaultMediaReceiver extends EventEmitter {
      load(media: MediaInfo, options: LoadOptions, callback: Callback<MediaStatus>): void
      getStatus(callback: Callback<MediaStatus | undefined>): void
      stop(callback?: Callback<MediaStatus | undefined>): void
      close(): void
    }

    class Client extends EventEmitter {
      connect(options: { host: string; port?: number }, callback: () => void): void
      launch(application: typeof DefaultMediaReceiver, callback: Callback<DefaultMediaReceiver>): void
      getStatus(callback: Callback<unknown>): void
      close(): void
    }
  }

  export = castv2
}
