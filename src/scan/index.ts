export { DEFAULT_SETTLE_DELAY_MS, extractCodes, seekAndCapture } from './controller.js'
export type { ExtractCodesOptions, Sleep } from './controller.js'
export { CaptureError, DecodeError, FetchError } from './errors.js'
export { assertImage, sniffImageKind } from './image.js'
export { clampWorkers, DEFAULT_SCAN_WORKERS, runScanPool, runWithConcurrency } from './pool.js'
export type { ScanPoolOptions, ScanPoolResult } from './pool.js'
export { recognizeCodes } from './recognize.js'
export type { CodeRecognizer } from './recognize.js'
export type {
  ArchiveEntry,
  CatalogProvider,
  CodeArchive,
  ExtractionReport,
  FrameDescriptor,
  FrameSource,
  ImageKind,
  NavigationPoint,
  OcrEngine,
  RecognizedCode,
  ScanEvent,
  ScanEventListener,
  ScanOutcome,
  ScanPhase,
  VideoLocation,
  VideoPlayer,
} from './types.js'
