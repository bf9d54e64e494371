import { mkdtemp, readFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { describe, expect, it } from 'vitest'

import { buildArchiveFileName, createFileArchive } from '../src/archive/file-archive.js'

describe('buildArchiveFileName', () => {
  it('names files by phase, code and timestamp', () => {
    const name = buildArchiveFileName({
      codeText: 'LUT DESERT',
      timestampLabel: '12:34',
      phase: 'video',
      kind: 'jpeg',
    })
    expect(name).toMatch(/^video_code_LUT_DESERT_12_34_[0-9a-f]{8}\.jpg$/)
  })

  it('is stable per code and timestamp', () => {
    const entry = { codeText: 'CAT', timestampLabel: '1:00', phase: 'thumbnail' as const }
    const first = buildArchiveFileName({ ...entry, kind: 'png' })
    expect(buildArchiveFileName({ ...entry, kind: 'png' })).toBe(first)
    expect(buildArchiveFileName({ ...entry, timestampLabel: '1:01', kind: 'png' })).not.toBe(first)
  })

  it('uses a placeholder for labels without letters or digits', () => {
    const name = buildArchiveFileName({
      codeText: 'CAT',
      timestampLabel: '::',
      phase: 'thumbnail',
      kind: 'png',
    })
    expect(name).toMatch(/^thumbnail_code_CAT_unknown_[0-9a-f]{8}\.png$/)
  })
})

describe('createFileArchive', () => {
  it('creates the directory and writes the frame bytes', async () => {
    const root = await mkdtemp(path.join(tmpdir(), 'codefind-archive-'))
    const dir = path.join(root, 'nested', 'codes')
    const archive = createFileArchive({ dir })
    const image = new Uint8Array([0x89, 0x50, 0x4e, 0x47])

    const savedTo = await archive.save({
      codeText: 'CAT',
      timestampLabel: '3:10',
      sourceImageRef: 'https://cdn.example.test/thumbs/0310.png',
      phase: 'thumbnail',
      image,
      kind: 'png',
    })

    expect(path.dirname(savedTo)).toBe(dir)
    expect(path.basename(savedTo)).toMatch(/^thumbnail_code_CAT_3_10_[0-9a-f]{8}\.png$/)
    expect(Array.from(await readFile(savedTo))).toEqual([0x89, 0x50, 0x4e, 0x47])
  })
})
