import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

export type LoggingLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggingFormat = 'json' | 'pretty'
export type LoggingConfig = {
  enabled?: boolean
  level?: LoggingLevel
  format?: LoggingFormat
  file?: string
  maxMb?: number
  maxFiles?: number
}

export type ScanConfig = {
  /** Thumbnail pool width (1-16). Default: 5. */
  workers?: number
  /** Wait after each video seek when the player has no readiness signal. Default: 1500. */
  settleDelayMs?: number
  /** Per-frame fetch/capture timeout. Default: 30000. */
  timeoutMs?: number
}

export type OcrConfig = {
  tesseractPath?: string
  /** Tesseract language code(s), e.g. "eng" or "eng+deu". */
  language?: string
  /** Tesseract page segmentation mode (0-13). */
  psm?: number
}

export type VideoConfig = {
  ffmpegPath?: string
}

export type ArchiveConfig = {
  dir?: string
}

export type CodefindConfig = {
  scan?: ScanConfig
  ocr?: OcrConfig
  video?: VideoConfig
  archive?: ArchiveConfig
  logging?: LoggingConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseOptionalString(raw: unknown, path: string, label: string): string | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "${label}" must be a string.`)
  }
  const trimmed = raw.trim()
  if (!trimmed) {
    throw new Error(`Invalid config file ${path}: "${label}" must not be empty.`)
  }
  return trimmed
}

function parseOptionalNumber(
  raw: unknown,
  path: string,
  label: string,
  { min, max, integer = false }: { min: number; max?: number; integer?: boolean }
): number | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be a number.`)
  }
  if (integer && !Number.isInteger(raw)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an integer.`)
  }
  if (raw < min || (typeof max === 'number' && raw > max)) {
    const range = typeof max === 'number' ? `${min}-${max}` : `>= ${min}`
    throw new Error(`Invalid config file ${path}: "${label}" must be in range ${range}.`)
  }
  return raw
}

function parseSection(raw: unknown, path: string, label: string): Record<string, unknown> | null {
  if (typeof raw === 'undefined') return null
  if (!isRecord(raw)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an object.`)
  }
  return raw
}

function parseLoggingLevel(raw: unknown, path: string): LoggingLevel {
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "logging.level" must be a string.`)
  }
  const trimmed = raw.trim().toLowerCase()
  if (trimmed === 'debug' || trimmed === 'info' || trimmed === 'warn' || trimmed === 'error') {
    return trimmed
  }
  throw new Error(
    `Invalid config file ${path}: "logging.level" must be one of "debug", "info", "warn", "error".`
  )
}

function parseLoggingFormat(raw: unknown, path: string): LoggingFormat {
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "logging.format" must be a string.`)
  }
  const trimmed = raw.trim().toLowerCase()
  if (trimmed === 'json' || trimmed === 'pretty') {
    return trimmed
  }
  throw new Error(
    `Invalid config file ${path}: "logging.format" must be one of "json" or "pretty".`
  )
}

function hasValues(value: Record<string, unknown>): boolean {
  return Object.values(value).some((entry) => typeof entry !== 'undefined')
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const explicit = env.CODEFIND_CONFIG?.trim()
  if (explicit) return explicit
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  if (!home) return null
  return join(home, '.codefind', 'config.json')
}

export function loadCodefindConfig({ env }: { env: Record<string, string | undefined> }): {
  config: CodefindConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const scan = (() => {
    const value = parseSection(parsed.scan, path, 'scan')
    if (!value) return undefined
    const workers = parseOptionalNumber(value.workers, path, 'scan.workers', {
      min: 1,
      max: 16,
      integer: true,
    })
    const settleDelayMs = parseOptionalNumber(value.settleDelayMs, path, 'scan.settleDelayMs', {
      min: 0,
    })
    const timeoutMs = parseOptionalNumber(value.timeoutMs, path, 'scan.timeoutMs', { min: 1 })
    const result: ScanConfig = {
      ...(typeof workers === 'number' ? { workers } : {}),
      ...(typeof settleDelayMs === 'number' ? { settleDelayMs } : {}),
      ...(typeof timeoutMs === 'number' ? { timeoutMs } : {}),
    }
    return hasValues(result) ? result : undefined
  })()

  const ocr = (() => {
    const value = parseSection(parsed.ocr, path, 'ocr')
    if (!value) return undefined
    const tesseractPath = parseOptionalString(value.tesseractPath, path, 'ocr.tesseractPath')
    const language = parseOptionalString(value.language, path, 'ocr.language')
    const psm = parseOptionalNumber(value.psm, path, 'ocr.psm', { min: 0, max: 13, integer: true })
    const result: OcrConfig = {
      ...(tesseractPath ? { tesseractPath } : {}),
      ...(language ? { language } : {}),
      ...(typeof psm === 'number' ? { psm } : {}),
    }
    return hasValues(result) ? result : undefined
  })()

  const video = (() => {
    const value = parseSection(parsed.video, path, 'video')
    if (!value) return undefined
    const ffmpegPath = parseOptionalString(value.ffmpegPath, path, 'video.ffmpegPath')
    return ffmpegPath ? { ffmpegPath } : undefined
  })()

  const archive = (() => {
    const value = parseSection(parsed.archive, path, 'archive')
    if (!value) return undefined
    const dir = parseOptionalString(value.dir, path, 'archive.dir')
    return dir ? { dir } : undefined
  })()

  const logging = (() => {
    const value = parseSection(parsed.logging, path, 'logging')
    if (!value) return undefined
    if (typeof value.enabled !== 'undefined' && typeof value.enabled !== 'boolean') {
      throw new Error(`Invalid config file ${path}: "logging.enabled" must be a boolean.`)
    }
    const enabled = typeof value.enabled === 'boolean' ? value.enabled : undefined
    const level =
      typeof value.level === 'undefined' ? undefined : parseLoggingLevel(value.level, path)
    const format =
      typeof value.format === 'undefined' ? undefined : parseLoggingFormat(value.format, path)
    const file = parseOptionalString(value.file, path, 'logging.file')
    const maxMb = parseOptionalNumber(value.maxMb, path, 'logging.maxMb', { min: 0.001 })
    const maxFiles = parseOptionalNumber(value.maxFiles, path, 'logging.maxFiles', {
      min: 1,
      integer: true,
    })
    const result: LoggingConfig = {
      ...(typeof enabled === 'boolean' ? { enabled } : {}),
      ...(level ? { level } : {}),
      ...(format ? { format } : {}),
      ...(file ? { file } : {}),
      ...(typeof maxMb === 'number' ? { maxMb } : {}),
      ...(typeof maxFiles === 'number' ? { maxFiles } : {}),
    }
    return hasValues(result) ? result : undefined
  })()

  return {
    config: {
      ...(scan ? { scan } : {}),
      ...(ocr ? { ocr } : {}),
      ...(video ? { video } : {}),
      ...(archive ? { archive } : {}),
      ...(logging ? { logging } : {}),
    },
    path,
  }
}
