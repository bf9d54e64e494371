import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { pathToFileURL } from 'node:url'

import { Command, CommanderError } from 'commander'

import { createFileArchive } from './archive/file-archive.js'
import { createViewerCatalog } from './catalog/viewer.js'
import { loadCodefindConfig } from './config.js'
import { createCodefindLogger } from './logging/logger.js'
import { createTesseractEngine } from './ocr/tesseract.js'
import { resolveToolPath } from './process.js'
import { extractCodes } from './scan/controller.js'
import type {
  ExtractionReport,
  OcrEngine,
  ScanEvent,
  ScanOutcome,
  VideoLocation,
} from './scan/types.js'
import { resolveScanSettings } from './settings.js'
import { createFrameSource } from './sources/frame-source.js'
import { createThumbnailFetcher } from './sources/http.js'

type RunEnv = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd?: string
  ocr?: OcrEngine
}

type ProgramOptions = {
  baseUrl?: string
  video?: string
  workers?: string
  settleDelay?: string
  timeout?: string
  lang?: string
  psm?: string
  archiveDir?: string
  json: boolean
  verbose: boolean
  debug: boolean
}

export function buildProgram() {
  return new Command()
    .name('codefind')
    .description('Find attendance and clicker-question codes shown in a recorded lecture.')
    .argument('<input>', 'Saved lecture viewer HTML file, or the http(s) URL of the page')
    .option('--base-url <url>', 'Base URL for relative thumbnail/video links in a saved file.')
    .option('--video <src>', "Video URL or path to scan instead of the page's player.")
    .option('--workers <count>', 'Thumbnails processed in parallel (1-16, default: 5).')
    .option('--settle-delay <duration>', 'Wait after each video seek (default: 1.5s).')
    .option('--timeout <duration>', 'Per-frame download/capture timeout (default: 30s).')
    .option('--lang <code>', 'Tesseract OCR language (default: eng).')
    .option('--psm <mode>', 'Tesseract page segmentation mode (default: 3).')
    .option('--archive-dir <dir>', 'Save an image of every frame a code was found on.')
    .option('--json', 'Print the extraction report as JSON.', false)
    .option('--verbose', 'Print scan progress to stderr.', false)
    .option('--debug', 'Print debug logs to stderr (implies --verbose).', false)
}

function isHttpUrl(raw: string): boolean {
  return /^https?:\/\//i.test(raw.trim())
}

async function loadMarkup({
  input,
  cwd,
  fetchImpl,
  timeoutMs,
}: {
  input: string
  cwd: string
  fetchImpl: typeof fetch
  timeoutMs: number
}): Promise<{ markup: string; baseUrl: string }> {
  if (isHttpUrl(input)) {
    const response = await fetchImpl(input, { signal: AbortSignal.timeout(timeoutMs) })
    if (!response.ok) {
      throw new Error(`Failed to load ${input}: ${response.status}`)
    }
    return { markup: await response.text(), baseUrl: response.url || input }
  }
  const filePath = path.resolve(cwd, input)
  const markup = await readFile(filePath, 'utf8')
  return { markup, baseUrl: pathToFileURL(filePath).href }
}

function resolveVideoOverride(raw: string, cwd: string): VideoLocation {
  const trimmed = raw.trim()
  if (isHttpUrl(trimmed) || trimmed.startsWith('file:')) return { src: trimmed, via: 'player' }
  return { src: path.resolve(cwd, trimmed), via: 'player' }
}

function formatEvent(event: ScanEvent): string {
  switch (event.type) {
    case 'phase':
      return event.phase === 'thumbnail'
        ? 'scanning thumbnails'
        : 'no codes in thumbnails; scanning the video'
    case 'frame':
      return `${event.phase} ${event.completed}/${event.total} ${event.timestampLabel}`
    case 'frame-error':
      return `${event.phase} ${event.timestampLabel} failed: ${event.error.message}`
    case 'code':
      return `found ${event.code} at ${event.timestampLabel} (${event.phase})`
    case 'video-skipped':
      return `video scan skipped: ${event.reason}`
  }
}

function serializeOutcome(outcome: ScanOutcome) {
  return {
    timestamp: outcome.timestampLabel,
    codes: Array.from(outcome.codes),
    source: outcome.sourceImageRef,
  }
}

function serializeReport(report: ExtractionReport) {
  return {
    codes: Array.from(report.codes),
    phase: report.phase,
    videoSkipped: report.videoSkipped,
    failedFrames: report.failedFrames,
    outcomes: report.outcomes.map(serializeOutcome),
  }
}

export async function runCli(
  argv: string[],
  { env, fetch: fetchImpl, stdout, stderr, cwd = process.cwd(), ocr: ocrOverride }: RunEnv
): Promise<void> {
  const normalizedArgv = argv.filter((arg) => arg !== '--')
  const program = buildProgram()
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  program.exitOverride()

  try {
    program.parse(normalizedArgv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return
    }
    throw error
  }

  const opts = program.opts<ProgramOptions>()
  const input = program.args[0]
  if (!input) throw new Error('Missing <input>')
  const debug = opts.debug
  const verbose = opts.verbose || debug

  const { config } = loadCodefindConfig({ env })
  const logging = createCodefindLogger({ env, config, stderr, verbose: debug })
  const logger = logging.logger

  try {
    const settings = resolveScanSettings({
      workers: opts.workers,
      settleDelay: opts.settleDelay,
      timeout: opts.timeout,
      lang: opts.lang,
      psm: opts.psm,
      archiveDir: opts.archiveDir,
      env,
      config,
      cwd,
    })
    logger.debug({ event: 'settings', ...settings })

    const loaded = await loadMarkup({ input, cwd, fetchImpl, timeoutMs: settings.timeoutMs })
    const baseUrl = opts.baseUrl?.trim() || loaded.baseUrl
    const catalog = createViewerCatalog({ baseUrl })

    const thumbnails = catalog.listThumbnails(loaded.markup)
    const labels = new Map(thumbnails.map((thumb) => [thumb.locator, thumb.timestampLabel]))
    const video = opts.video
      ? resolveVideoOverride(opts.video, cwd)
      : catalog.locateVideo(loaded.markup)

    const ocr =
      ocrOverride ??
      (() => {
        const tesseractPath = resolveToolPath('tesseract', env, {
          explicitEnvKey: 'TESSERACT_PATH',
          configured: config?.ocr?.tesseractPath,
        })
        if (!tesseractPath) {
          throw new Error('Missing tesseract OCR (install tesseract or set TESSERACT_PATH).')
        }
        return createTesseractEngine({
          tesseractPath,
          language: settings.language,
          psm: settings.psm,
          logger: logging.getSubLogger('ocr'),
        })
      })()

    const frameSource = createFrameSource({
      fetchThumbnail: createThumbnailFetcher({
        fetchImpl,
        timeoutMs: settings.timeoutMs,
        labelFor: (locator) => labels.get(locator) ?? locator,
      }),
      video,
      ffmpegPath: resolveToolPath('ffmpeg', env, {
        explicitEnvKey: 'FFMPEG_PATH',
        configured: config?.video?.ffmpegPath,
      }),
      captureTimeoutMs: settings.timeoutMs,
      logger: logging.getSubLogger('video'),
    })

    const report = await extractCodes({
      markup: loaded.markup,
      catalog,
      frameSource,
      ocr,
      workers: settings.workers,
      settleDelayMs: settings.settleDelayMs,
      archive: settings.archiveDir ? createFileArchive({ dir: settings.archiveDir }) : null,
      logger: logging.getSubLogger('scan'),
      onEvent: verbose
        ? (event) => {
            stderr.write(`[codefind] ${formatEvent(event)}\n`)
          }
        : null,
    })

    if (opts.json) {
      stdout.write(`${JSON.stringify(serializeReport(report), null, 2)}\n`)
      return
    }
    if (report.codes.size === 0) {
      stdout.write('No attendance codes could be extracted.\n')
      return
    }
    stdout.write('Found attendance codes:\n')
    for (const code of report.codes) {
      stdout.write(`- ${code}\n`)
    }
  } finally {
    await logging.flush()
  }
}
