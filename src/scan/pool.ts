import type { ScanLogger } from '../logging/logger.js'
import { toError } from './errors.js'
import { createEmitter, processFrame } from './frame.js'
import { type CodeRecognizer, recognizeCodes } from './recognize.js'
import type {
  CodeArchive,
  FrameDescriptor,
  OcrEngine,
  ScanEventListener,
  ScanOutcome,
} from './types.js'

export const DEFAULT_SCAN_WORKERS = 5
export const MAX_SCAN_WORKERS = 16

export function clampWorkers(workers: number): number {
  if (!Number.isFinite(workers)) return DEFAULT_SCAN_WORKERS
  return Math.max(1, Math.min(MAX_SCAN_WORKERS, Math.round(workers)))
}

/**
 * Runs `tasks` with at most `workers` in flight. Results keep the task order; a rejected
 * task rejects the whole run, so callers that need isolation catch inside the task.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  onProgress?: ((completed: number, total: number, index: number) => void) | null
): Promise<T[]> {
  if (tasks.length === 0) return []
  const concurrency = clampWorkers(workers)
  const results: T[] = new Array(tasks.length)
  const total = tasks.length
  let completed = 0
  let nextIndex = 0

  const worker = async () => {
    while (true) {
      const current = nextIndex
      if (current >= tasks.length) return
      nextIndex += 1
      const task = tasks[current]
      if (!task) continue
      try {
        results[current] = await task()
      } finally {
        completed += 1
        onProgress?.(completed, total, current)
      }
    }
  }

  const runners = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker())
  await Promise.all(runners)
  return results
}

export type ScanPoolOptions = {
  descriptors: FrameDescriptor[]
  fetch: (locator: string) => Promise<Uint8Array>
  ocr: OcrEngine
  recognize?: CodeRecognizer
  workers?: number
  archive?: CodeArchive | null
  logger?: ScanLogger | null
  onEvent?: ScanEventListener | null
}

export type ScanPoolResult = {
  outcomes: ScanOutcome[]
  failedFrames: number
}

/** Thumbnail phase: fetch, OCR and recognize every descriptor on a bounded pool. */
export async function runScanPool({
  descriptors,
  fetch,
  ocr,
  recognize = recognizeCodes,
  workers = DEFAULT_SCAN_WORKERS,
  archive,
  logger,
  onEvent,
}: ScanPoolOptions): Promise<ScanPoolResult> {
  const emit = createEmitter(onEvent, logger)
  const context = { phase: 'thumbnail' as const, ocr, recognize, archive, logger, emit }
  let failedFrames = 0

  const tasks = descriptors.map((descriptor) => async (): Promise<ScanOutcome | null> => {
    const { locator, timestampLabel } = descriptor
    try {
      const image = await fetch(locator)
      return await processFrame(image, { timestampLabel, sourceImageRef: locator }, context)
    } catch (error) {
      failedFrames += 1
      const err = toError(error)
      logger?.warn({
        event: 'frame.failed',
        phase: 'thumbnail',
        timestamp: timestampLabel,
        errorName: err.name,
        error: err.message,
      })
      emit({ type: 'frame-error', phase: 'thumbnail', timestampLabel, error: err })
      return null
    }
  })

  const results = await runWithConcurrency(tasks, workers, (completed, total, index) => {
    const timestampLabel = descriptors[index]?.timestampLabel ?? 'unknown'
    emit({ type: 'frame', phase: 'thumbnail', timestampLabel, completed, total })
  })

  const outcomes = results.filter((outcome): outcome is ScanOutcome => outcome != null)
  logger?.info({
    event: 'pool.done',
    frames: descriptors.length,
    withCodes: outcomes.length,
    failed: failedFrames,
  })
  return { outcomes, failedFrames }
}
