import path from 'node:path'

import type { CodefindConfig } from './config.js'
import {
  parseDurationMs,
  parseLanguageArg,
  parsePsmArg,
  parseSettleDelayMs,
  parseWorkersArg,
} from './flags.js'
import { DEFAULT_OCR_LANGUAGE, DEFAULT_OCR_PSM } from './ocr/tesseract.js'
import { DEFAULT_SETTLE_DELAY_MS } from './scan/controller.js'
import { clampWorkers, DEFAULT_SCAN_WORKERS } from './scan/pool.js'
import { DEFAULT_FRAME_TIMEOUT_MS } from './sources/http.js'

export type ScanSettings = {
  workers: number
  settleDelayMs: number
  timeoutMs: number
  language: string
  psm: number
  archiveDir: string | null
}

export type ScanSettingsInput = {
  workers?: string | null
  settleDelay?: string | null
  timeout?: string | null
  lang?: string | null
  psm?: string | null
  archiveDir?: string | null
  env: Record<string, string | undefined>
  config: CodefindConfig | null
  cwd: string
}

function resolveEnvWorkers(env: Record<string, string | undefined>): number | null {
  const raw = env.CODEFIND_WORKERS?.trim()
  if (!raw) return null
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed <= 0) return null
  return clampWorkers(parsed)
}

function resolveEnvSettleDelay(env: Record<string, string | undefined>): number | null {
  const raw = env.CODEFIND_SETTLE_DELAY_MS?.trim()
  if (!raw) return null
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed < 0) return null
  return Math.round(parsed)
}

const present = (raw: string | null | undefined): raw is string =>
  typeof raw === 'string' && raw.trim().length > 0

/** Flag > env > config file > default. */
export function resolveScanSettings(input: ScanSettingsInput): ScanSettings {
  const { env, config, cwd } = input

  const workers = present(input.workers)
    ? parseWorkersArg(input.workers)
    : (resolveEnvWorkers(env) ?? config?.scan?.workers ?? DEFAULT_SCAN_WORKERS)

  const settleDelayMs = present(input.settleDelay)
    ? parseSettleDelayMs(input.settleDelay)
    : (resolveEnvSettleDelay(env) ?? config?.scan?.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS)

  const timeoutMs = present(input.timeout)
    ? parseDurationMs(input.timeout)
    : (config?.scan?.timeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS)

  const language = present(input.lang)
    ? parseLanguageArg(input.lang)
    : (config?.ocr?.language ?? DEFAULT_OCR_LANGUAGE)

  const psm = present(input.psm) ? parsePsmArg(input.psm) : (config?.ocr?.psm ?? DEFAULT_OCR_PSM)

  const archiveRaw = present(input.archiveDir) ? input.archiveDir.trim() : config?.archive?.dir
  const archiveDir = archiveRaw ? path.resolve(cwd, archiveRaw) : null

  return { workers, settleDelayMs, timeoutMs, language, psm, archiveDir }
}
