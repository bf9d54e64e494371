import type { ScanLogger } from '../logging/logger.js'
import { runProcessCaptureBuffer } from '../process.js'
import { toError } from '../scan/errors.js'
import type { OcrEngine } from '../scan/types.js'

export const TESSERACT_TIMEOUT_MS = 120_000
export const DEFAULT_OCR_LANGUAGE = 'eng'
export const DEFAULT_OCR_PSM = 3

export type TesseractOptions = {
  tesseractPath: string
  language?: string
  psm?: number
  timeoutMs?: number
  logger?: ScanLogger | null
}

export function buildTesseractArgs({ language, psm }: { language: string; psm: number }): string[] {
  return ['stdin', 'stdout', '--oem', '3', '--psm', String(psm), '-l', language]
}

/**
 * OCR through the `tesseract` CLI, image bytes on stdin. Never rejects: a failed run is
 * logged and reads as an empty page.
 */
export function createTesseractEngine({
  tesseractPath,
  language = DEFAULT_OCR_LANGUAGE,
  psm = DEFAULT_OCR_PSM,
  timeoutMs = TESSERACT_TIMEOUT_MS,
  logger,
}: TesseractOptions): OcrEngine {
  const args = buildTesseractArgs({ language, psm })
  return {
    extractText: async (image) => {
      try {
        const stdout = await runProcessCaptureBuffer({
          command: tesseractPath,
          args,
          timeoutMs,
          errorLabel: 'tesseract',
          input: image,
        })
        return stdout.toString('utf8')
      } catch (error) {
        logger?.warn({ event: 'ocr.failed', bytes: image.length, error: toError(error).message })
        return ''
      }
    },
  }
}
