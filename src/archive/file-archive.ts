import { createHash } from 'node:crypto'
import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { CodeArchive, ImageKind, ScanPhase } from '../scan/types.js'

const EXTENSIONS: Record<ImageKind, string> = {
  png: 'png',
  jpeg: 'jpg',
  gif: 'gif',
  webp: 'webp',
  bmp: 'bmp',
}

function toSlug(value: string): string {
  const normalized = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
  return normalized.slice(0, 32) || 'unknown'
}

/** `<phase>_code_<CODE_WORDS>_<label>_<hash8>.<ext>`, stable per (code, timestamp). */
export function buildArchiveFileName({
  codeText,
  timestampLabel,
  phase,
  kind,
}: {
  codeText: string
  timestampLabel: string
  phase: ScanPhase
  kind: ImageKind
}): string {
  const codePart = codeText.trim().replace(/\s+/g, '_')
  const hash = createHash('sha1')
    .update(`${codeText}\u0000${timestampLabel}`)
    .digest('hex')
    .slice(0, 8)
  return `${phase}_code_${codePart}_${toSlug(timestampLabel)}_${hash}.${EXTENSIONS[kind]}`
}

export function createFileArchive({ dir }: { dir: string }): CodeArchive {
  let ready: Promise<string | undefined> | null = null
  return {
    save: async (entry) => {
      ready ??= fs.mkdir(dir, { recursive: true })
      await ready
      const filePath = path.join(dir, buildArchiveFileName(entry))
      await fs.writeFile(filePath, entry.image)
      return filePath
    },
  }
}
