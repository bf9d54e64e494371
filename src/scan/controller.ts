import { setTimeout as delay } from 'node:timers/promises'

import type { ScanLogger } from '../logging/logger.js'
import { toError } from './errors.js'
import { createEmitter, processFrame } from './frame.js'
import { DEFAULT_SCAN_WORKERS, runScanPool } from './pool.js'
import { type CodeRecognizer, recognizeCodes } from './recognize.js'
import type {
  CatalogProvider,
  CodeArchive,
  ExtractionReport,
  FrameSource,
  OcrEngine,
  ScanEventListener,
  ScanOutcome,
  VideoPlayer,
} from './types.js'

export const DEFAULT_SETTLE_DELAY_MS = 1500

export type Sleep = (ms: number) => Promise<void>

const defaultSleep: Sleep = async (ms) => {
  await delay(ms)
}

/**
 * Seeks the shared player, waits for the frame to render and captures it. A player with a
 * readiness signal is awaited instead of sleeping `settleDelayMs`.
 */
export async function seekAndCapture(
  player: VideoPlayer,
  offsetSeconds: number,
  {
    settleDelayMs = DEFAULT_SETTLE_DELAY_MS,
    sleep = defaultSleep,
  }: { settleDelayMs?: number; sleep?: Sleep } = {}
): Promise<Uint8Array> {
  await player.seek(offsetSeconds)
  if (player.waitForFrame) {
    await player.waitForFrame()
  } else if (settleDelayMs > 0) {
    await sleep(settleDelayMs)
  }
  return await player.capture()
}

export type ExtractCodesOptions = {
  markup: string
  catalog: CatalogProvider
  frameSource: FrameSource
  ocr: OcrEngine
  recognize?: CodeRecognizer
  workers?: number
  settleDelayMs?: number
  archive?: CodeArchive | null
  logger?: ScanLogger | null
  onEvent?: ScanEventListener | null
  sleep?: Sleep
}

function mergeCodes(accumulator: Set<string>, outcomes: ScanOutcome[]) {
  for (const outcome of outcomes) {
    for (const code of outcome.codes) accumulator.add(code)
  }
}

/**
 * Finds codes on a lecture page: thumbnails first, then a sequential walk of the video
 * when the thumbnails yield nothing. An empty `codes` set is a valid answer.
 */
export async function extractCodes({
  markup,
  catalog,
  frameSource,
  ocr,
  recognize = recognizeCodes,
  workers = DEFAULT_SCAN_WORKERS,
  settleDelayMs = DEFAULT_SETTLE_DELAY_MS,
  archive,
  logger,
  onEvent,
  sleep = defaultSleep,
}: ExtractCodesOptions): Promise<ExtractionReport> {
  const emit = createEmitter(onEvent, logger)
  const codes = new Set<string>()
  const outcomes: ScanOutcome[] = []
  let failedFrames = 0

  emit({ type: 'phase', phase: 'thumbnail' })
  const thumbnails = catalog.listThumbnails(markup)
  logger?.info({ event: 'phase.thumbnail', frames: thumbnails.length })
  if (thumbnails.length > 0) {
    const pool = await runScanPool({
      descriptors: thumbnails,
      fetch: (locator) => frameSource.fetchByLocator(locator),
      ocr,
      recognize,
      workers,
      archive,
      logger,
      onEvent: emit,
    })
    outcomes.push(...pool.outcomes)
    failedFrames += pool.failedFrames
    mergeCodes(codes, pool.outcomes)
  }
  if (codes.size > 0) {
    logger?.info({ event: 'done', phase: 'thumbnail', codes: codes.size })
    return { codes, phase: 'thumbnail', outcomes, failedFrames, videoSkipped: false }
  }

  emit({ type: 'phase', phase: 'video' })
  const player = await frameSource.locatePlayer()
  if (!player) {
    const reason = 'No video player could be located'
    logger?.warn({ event: 'phase.video.skipped', reason })
    emit({ type: 'video-skipped', reason })
    return { codes, phase: null, outcomes, failedFrames, videoSkipped: true }
  }

  const points = catalog.listNavigationPoints(markup)
  logger?.info({ event: 'phase.video', player: player.label, points: points.length })
  const context = { phase: 'video' as const, ocr, recognize, archive, logger, emit }

  let completed = 0
  for (const { offsetSeconds, timestampLabel } of points) {
    try {
      const image = await seekAndCapture(player, offsetSeconds, { settleDelayMs, sleep })
      const outcome = await processFrame(
        image,
        { timestampLabel, sourceImageRef: `${player.label}#t=${offsetSeconds}` },
        context
      )
      if (outcome) {
        for (const code of outcome.codes) {
          if (!codes.has(code)) {
            logger?.info({ event: 'code.found', phase: 'video', code, timestamp: timestampLabel })
          }
        }
        outcomes.push(outcome)
        mergeCodes(codes, [outcome])
      }
    } catch (error) {
      failedFrames += 1
      const err = toError(error)
      logger?.warn({
        event: 'frame.failed',
        phase: 'video',
        timestamp: timestampLabel,
        errorName: err.name,
        error: err.message,
      })
      emit({ type: 'frame-error', phase: 'video', timestampLabel, error: err })
    } finally {
      completed += 1
      emit({ type: 'frame', phase: 'video', timestampLabel, completed, total: points.length })
    }
  }

  logger?.info({ event: 'done', phase: 'video', codes: codes.size })
  return {
    codes,
    phase: codes.size > 0 ? 'video' : null,
    outcomes,
    failedFrames,
    videoSkipped: false,
  }
}
