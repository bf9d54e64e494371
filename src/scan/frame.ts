import type { ScanLogger } from '../logging/logger.js'
import { toError } from './errors.js'
import { assertImage } from './image.js'
import type { CodeRecognizer } from './recognize.js'
import type {
  CodeArchive,
  OcrEngine,
  RecognizedCode,
  ScanEvent,
  ScanEventListener,
  ScanOutcome,
  ScanPhase,
} from './types.js'

export type FrameContext = {
  phase: ScanPhase
  ocr: OcrEngine
  recognize: CodeRecognizer
  archive?: CodeArchive | null
  logger?: ScanLogger | null
  emit: (event: ScanEvent) => void
}

export function createEmitter(
  onEvent: ScanEventListener | null | undefined,
  logger: ScanLogger | null | undefined
): (event: ScanEvent) => void {
  return (event) => {
    if (!onEvent) return
    try {
      onEvent(event)
    } catch (error) {
      logger?.warn({
        event: 'listener.failed',
        scanEvent: event.type,
        error: toError(error).message,
      })
    }
  }
}

/**
 * Sniffs, OCRs and recognizes one frame's bytes. Throws `DecodeError` for unreadable
 * bytes; returns null when the frame carries no code.
 */
export async function processFrame(
  image: Uint8Array,
  {
    timestampLabel,
    sourceImageRef,
  }: {
    timestampLabel: string
    sourceImageRef: string
  },
  context: FrameContext
): Promise<ScanOutcome | null> {
  const { phase, ocr, recognize, archive, logger, emit } = context
  const kind = assertImage(image, timestampLabel)
  const rawText = await ocr.extractText(image)
  logger?.debug({ event: 'frame.ocr', phase, timestamp: timestampLabel, chars: rawText.length })

  const codes = recognize(rawText, phase)
  if (codes.size === 0) return null

  for (const code of codes) {
    emit({ type: 'code', phase, code, timestampLabel })
    if (!archive) continue
    try {
      const recognized: RecognizedCode = { timestampLabel, codeText: code, sourceImageRef }
      const savedTo = await archive.save({ ...recognized, phase, image, kind })
      logger?.debug({ event: 'archive.saved', code, timestamp: timestampLabel, path: savedTo })
    } catch (error) {
      logger?.warn({
        event: 'archive.failed',
        code,
        timestamp: timestampLabel,
        error: toError(error).message,
      })
    }
  }

  return { timestampLabel, codes, sourceImageRef }
}
