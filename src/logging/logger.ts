import path from 'node:path'

import { Logger } from 'tslog'

import type { CodefindConfig } from '../config.js'

import { createRingFileWriter, type RingFileWriter } from './ring-file.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogFormat = 'json' | 'pretty'

export type ScanLogger = Logger<Record<string, unknown>>

export type FileLoggingConfig = {
  enabled: true
  level: LogLevel
  format: LogFormat
  file: string
  maxBytes: number
  maxFiles: number
}

export type CodefindLogger = {
  logger: ScanLogger
  fileConfig: FileLoggingConfig | null
  getSubLogger: (name: string, logObj?: Record<string, unknown>) => ScanLogger
  flush: () => Promise<void>
}

const DEFAULT_LOG_LEVEL: LogLevel = 'info'
const DEFAULT_LOG_FORMAT: LogFormat = 'json'
const DEFAULT_LOG_MAX_MB = 10
const DEFAULT_LOG_MAX_FILES = 3

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return {
        name: val.name,
        message: val.message,
        stack: val.stack,
        cause: val.cause,
      }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

function formatPrettyLine({
  metaMarkup,
  args,
  errors,
}: {
  metaMarkup: string
  args: unknown[]
  errors: string[]
}): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(
      args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' ')
    )
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

function describeMeta(meta: unknown): string {
  if (typeof meta !== 'object' || meta === null) return ''
  const parts: string[] = []
  if ('date' in meta && meta.date instanceof Date) parts.push(meta.date.toISOString())
  if ('logLevelName' in meta && typeof meta.logLevelName === 'string') {
    parts.push(meta.logLevelName)
  }
  if ('name' in meta && typeof meta.name === 'string' && meta.name) parts.push(`[${meta.name}]`)
  return parts.join(' ')
}

// `time LEVEL [name] key=value ...`; positional string args have numeric keys.
function formatPrettyFileLine(logObj: Record<string, unknown>): string {
  const { _meta: meta, ...fields } = logObj
  const rendered = Object.entries(fields).map(([key, value]) => {
    const text = typeof value === 'string' ? value : safeJsonStringify(value)
    return /^\d+$/.test(key) ? text : `${key}=${text}`
  })
  return [describeMeta(meta), ...rendered].filter(Boolean).join(' ')
}

export function resolveFileLoggingConfig({
  env,
  config,
}: {
  env: Record<string, string | undefined>
  config: CodefindConfig | null
}): FileLoggingConfig | null {
  const logging = config?.logging
  if (!logging || logging.enabled !== true) return null

  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  const defaultFile = home ? path.join(home, '.codefind', 'logs', 'codefind.jsonl') : null
  const file =
    typeof logging.file === 'string' && logging.file.trim() ? logging.file.trim() : defaultFile
  if (!file) return null
  const maxMb =
    typeof logging.maxMb === 'number' && logging.maxMb > 0 ? logging.maxMb : DEFAULT_LOG_MAX_MB
  const maxFiles =
    typeof logging.maxFiles === 'number' && logging.maxFiles > 0
      ? Math.trunc(logging.maxFiles)
      : DEFAULT_LOG_MAX_FILES

  return {
    enabled: true,
    level: logging.level ?? DEFAULT_LOG_LEVEL,
    format: logging.format ?? DEFAULT_LOG_FORMAT,
    file,
    maxBytes: Math.trunc(maxMb * 1024 * 1024),
    maxFiles,
  }
}

/**
 * Builds the process logger.
 *
 * `verbose` prints pretty lines to `stderr`; `logging.enabled` in the config appends to a
 * rotating file. With neither, the logger is hidden and records go nowhere.
 */
export function createCodefindLogger({
  env,
  config,
  stderr,
  verbose,
}: {
  env: Record<string, string | undefined>
  config: CodefindConfig | null
  stderr: NodeJS.WritableStream
  verbose: boolean
}): CodefindLogger {
  const fileConfig = resolveFileLoggingConfig({ env, config })
  const writer: RingFileWriter | null = fileConfig
    ? createRingFileWriter({
        filePath: fileConfig.file,
        maxBytes: fileConfig.maxBytes,
        maxFiles: fileConfig.maxFiles,
      })
    : null

  const minLevel = verbose
    ? LOG_LEVEL_MAP.debug
    : LOG_LEVEL_MAP[fileConfig?.level ?? DEFAULT_LOG_LEVEL]

  const logger = new Logger<Record<string, unknown>>({
    name: 'codefind',
    minLevel,
    type: verbose ? 'pretty' : 'hidden',
    hideLogPositionForProduction: true,
    metaProperty: '_meta',
    stylePrettyLogs: false,
    prettyLogTemplate: '[{{name}}] {{logLevelName}} ',
    overwrite: {
      transportFormatted: (metaMarkup, args, errors) => {
        stderr.write(`${formatPrettyLine({ metaMarkup, args, errors })}\n`)
      },
    },
  })

  if (writer && fileConfig) {
    logger.attachTransport((logObj) => {
      writer.write(
        fileConfig.format === 'pretty' ? formatPrettyFileLine(logObj) : safeJsonStringify(logObj)
      )
    })
  }

  return {
    logger,
    fileConfig,
    getSubLogger: (name, logObj) => logger.getSubLogger({ name }, logObj),
    flush: async () => {
      await writer?.flush()
    },
  }
}
