import type { ScanLogger } from '../logging/logger.js'
import type { FrameSource, VideoLocation } from '../scan/types.js'
import { createFfmpegPlayer } from './ffmpeg.js'

export function createFrameSource({
  fetchThumbnail,
  video,
  ffmpegPath,
  captureTimeoutMs,
  logger,
}: {
  fetchThumbnail: (locator: string) => Promise<Uint8Array>
  video: VideoLocation | null
  ffmpegPath: string | null
  captureTimeoutMs?: number
  logger?: ScanLogger | null
}): FrameSource {
  return {
    fetchByLocator: fetchThumbnail,
    locatePlayer: async () => {
      if (!video) {
        logger?.info({ event: 'player.missing', reason: 'no video element on page' })
        return null
      }
      if (!ffmpegPath) {
        logger?.warn({ event: 'player.missing', reason: 'ffmpeg not found', src: video.src })
        return null
      }
      logger?.info({ event: 'player.located', via: video.via, src: video.src })
      return createFfmpegPlayer({
        ffmpegPath,
        videoSrc: video.src,
        timeoutMs: captureTimeoutMs,
        logger,
      })
    },
  }
}
