import type { ScanPhase } from './types.js'

const TRIGGER_PATTERN = /attendance code|clicker question/
const FALLBACK_PROMPT = 'Insert the following attendance code'
const FALLBACK_LOOKAHEAD_LINES = 5
const FALLBACK_LINE_PATTERN = /^[A-Z\s]+$/
const EXCLUDED_FRAGMENTS = ['http', 'www', 'join', 'com']

// Uppercase words not glued to URLs, clock times or domains. Thumbnails accept a lone
// word ("CAT"); video frames need at least two ("LUT DESERT").
const CODE_PATTERNS: Record<ScanPhase, RegExp> = {
  thumbnail: /(?<![a-zA-Z0-9:/.])[A-Z]{2,}(?: [A-Z]{2,})*(?![a-zA-Z0-9:/.])/g,
  video: /(?<![a-zA-Z0-9:/.])[A-Z]{2,}(?: [A-Z]{2,})+(?![a-zA-Z0-9:/.])/g,
}

export function isCodeSlide(text: string): boolean {
  return TRIGGER_PATTERN.test(text.toLowerCase())
}

export function matchCodePattern(text: string, phase: ScanPhase): string[] {
  return Array.from(text.matchAll(CODE_PATTERNS[phase]), (match) => match[0])
}

export function isExcludedMatch(match: string): boolean {
  const lower = match.toLowerCase()
  return EXCLUDED_FRAGMENTS.some((fragment) => lower.includes(fragment))
}

export function findFallbackCode(text: string): string | null {
  const promptIndex = text.indexOf(FALLBACK_PROMPT)
  if (promptIndex < 0) return null
  const afterPrompt = text.slice(promptIndex + FALLBACK_PROMPT.length)
  const nextPrompt = afterPrompt.indexOf(FALLBACK_PROMPT)
  const window = nextPrompt < 0 ? afterPrompt : afterPrompt.slice(0, nextPrompt)
  const lines = window.split('\n').slice(0, FALLBACK_LOOKAHEAD_LINES)
  for (const line of lines) {
    const trimmed = line.trim()
    if (FALLBACK_LINE_PATTERN.test(trimmed) && trimmed.length > 3) return trimmed
  }
  return null
}

/**
 * Extracts attendance/clicker codes from the OCR text of one frame.
 *
 * Returns an empty set unless the text mentions "attendance code" or "clicker question".
 * Matches are kept in first-seen order.
 */
export function recognizeCodes(text: string, phase: ScanPhase): Set<string> {
  const codes = new Set<string>()
  if (!text || !isCodeSlide(text)) return codes

  for (const match of matchCodePattern(text, phase)) {
    if (!isExcludedMatch(match)) codes.add(match)
  }
  if (codes.size > 0) return codes

  const fallback = findFallbackCode(text)
  if (fallback) codes.add(fallback)
  return codes
}

export type CodeRecognizer = (text: string, phase: ScanPhase) => Set<string>
