const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s|m|h)?$/i
const MIN_WORKERS = 1
const MAX_WORKERS = 16
const MIN_PSM = 0
const MAX_PSM = 13

function parseDuration(raw: string, flag: string, { allowZero }: { allowZero: boolean }): number {
  const normalized = raw.trim()
  const match = DURATION_PATTERN.exec(normalized)
  if (!match?.groups) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }

  const numeric = Number(match.groups.value)
  if (!Number.isFinite(numeric) || numeric < 0 || (!allowZero && numeric === 0)) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }

  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const multiplier = unit === 'ms' ? 1 : unit === 's' ? 1000 : unit === 'm' ? 60_000 : 3_600_000
  return Math.floor(numeric * multiplier)
}

/** `30`, `30s`, `2m`, `500ms`. A bare number is seconds. */
export function parseDurationMs(raw: string): number {
  return parseDuration(raw, '--timeout', { allowZero: false })
}

export function parseSettleDelayMs(raw: string): number {
  return parseDuration(raw, '--settle-delay', { allowZero: true })
}

function parseIntegerInRange(raw: string, flag: string, min: number, max: number): number {
  const normalized = raw.trim()
  if (!normalized) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }
  const numeric = Number(normalized)
  if (!Number.isFinite(numeric) || !Number.isInteger(numeric)) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }
  if (numeric < min || numeric > max) {
    throw new Error(`Unsupported ${flag}: ${raw} (range ${min}-${max})`)
  }
  return numeric
}

export function parseWorkersArg(raw: string): number {
  return parseIntegerInRange(raw, '--workers', MIN_WORKERS, MAX_WORKERS)
}

export function parsePsmArg(raw: string): number {
  return parseIntegerInRange(raw, '--psm', MIN_PSM, MAX_PSM)
}

export function parseLanguageArg(raw: string): string {
  const normalized = raw.trim()
  if (!/^[a-z_]+(?:\+[a-z_]+)*$/i.test(normalized)) {
    throw new Error(`Unsupported --lang: ${raw}`)
  }
  return normalized
}
