import type { ScanLogger } from '../logging/logger.js'
import { runProcessCaptureBuffer } from '../process.js'
import { CaptureError } from '../scan/errors.js'
import type { VideoPlayer } from '../scan/types.js'

export const FFMPEG_CAPTURE_TIMEOUT_MS = 60_000

export function formatOffsetLabel(offsetSeconds: number): string {
  const total = Math.max(0, Math.floor(offsetSeconds))
  const hours = Math.floor(total / 3600)
  const minutes = Math.floor((total % 3600) / 60)
  const seconds = total % 60
  const mmss = `${minutes.toString().padStart(hours > 0 ? 2 : 1, '0')}:${seconds
    .toString()
    .padStart(2, '0')}`
  return hours > 0 ? `${hours}:${mmss}` : mmss
}

export function buildCaptureArgs(videoSrc: string, offsetSeconds: number): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-ss',
    offsetSeconds.toFixed(3),
    '-i',
    videoSrc,
    '-frames:v',
    '1',
    '-f',
    'image2pipe',
    '-vcodec',
    'png',
    '-',
  ]
}

/**
 * A video player backed by ffmpeg. `seek` only records the position and `capture`
 * decodes the single frame there. It has no readiness signal, so the controller waits
 * out the configured settle delay after each seek.
 */
export function createFfmpegPlayer({
  ffmpegPath,
  videoSrc,
  timeoutMs = FFMPEG_CAPTURE_TIMEOUT_MS,
  logger,
}: {
  ffmpegPath: string
  videoSrc: string
  timeoutMs?: number
  logger?: ScanLogger | null
}): VideoPlayer {
  let position = 0

  return {
    label: videoSrc,
    seek: async (offsetSeconds) => {
      if (!Number.isFinite(offsetSeconds) || offsetSeconds < 0) {
        throw new CaptureError(`Invalid seek offset ${offsetSeconds}`, {
          timestampLabel: String(offsetSeconds),
        })
      }
      position = offsetSeconds
    },
    capture: async () => {
      const timestampLabel = formatOffsetLabel(position)
      const startedAt = Date.now()
      let frame: Buffer
      try {
        frame = await runProcessCaptureBuffer({
          command: ffmpegPath,
          args: buildCaptureArgs(videoSrc, position),
          timeoutMs,
          errorLabel: 'ffmpeg',
        })
      } catch (error) {
        throw new CaptureError(`Failed to capture frame at ${timestampLabel}`, {
          timestampLabel,
          cause: error,
        })
      }
      if (frame.length === 0) {
        throw new CaptureError(`ffmpeg returned no frame at ${timestampLabel}`, { timestampLabel })
      }
      logger?.debug({
        event: 'capture.done',
        timestamp: timestampLabel,
        bytes: frame.length,
        elapsedMs: Date.now() - startedAt,
      })
      return new Uint8Array(frame)
    },
  }
}
