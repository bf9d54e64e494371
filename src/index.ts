export { createFileArchive } from './archive/file-archive.js'
export { createViewerCatalog, parseTimestampLabel } from './catalog/viewer.js'
export type { CodefindConfig } from './config.js'
export { loadCodefindConfig } from './config.js'
export { createCodefindLogger } from './logging/logger.js'
export type { ScanLogger } from './logging/logger.js'
export { createTesseractEngine } from './ocr/tesseract.js'
export { runCli } from './run.js'
export * from './scan/index.js'
export { resolveScanSettings } from './settings.js'
export type { ScanSettings } from './settings.js'
export { createFfmpegPlayer } from './sources/ffmpeg.js'
export { createFrameSource } from './sources/frame-source.js'
export { createThumbnailFetcher } from './sources/http.js'
