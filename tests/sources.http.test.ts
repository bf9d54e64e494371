import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { pathToFileURL } from 'node:url'

import { describe, expect, it, vi } from 'vitest'

import { FetchError } from '../src/scan/errors.js'
import { createThumbnailFetcher } from '../src/sources/http.js'

describe('createThumbnailFetcher', () => {
  it('downloads http thumbnails', async () => {
    const fetchImpl = vi.fn(async () => new Response(new Uint8Array([1, 2, 3])))
    const fetchThumbnail = createThumbnailFetcher({ fetchImpl })

    const bytes = await fetchThumbnail('https://cdn.example.test/a.jpg')

    expect(Array.from(bytes)).toEqual([1, 2, 3])
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://cdn.example.test/a.jpg',
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    )
  })

  it('raises FetchError with the timestamp label on a bad status', async () => {
    const fetchThumbnail = createThumbnailFetcher({
      fetchImpl: async () => new Response('gone', { status: 404 }),
      labelFor: () => '12:34',
    })

    const failure = fetchThumbnail('https://cdn.example.test/missing.jpg')
    await expect(failure).rejects.toBeInstanceOf(FetchError)
    await expect(failure).rejects.toMatchObject({
      message: 'Failed to download image at 12:34: 404',
      timestampLabel: '12:34',
    })
  })

  it('wraps network failures', async () => {
    const fetchThumbnail = createThumbnailFetcher({
      fetchImpl: async () => {
        throw new TypeError('fetch failed')
      },
    })

    await expect(fetchThumbnail('http://cdn.example.test/x.png')).rejects.toMatchObject({
      name: 'FetchError',
      message: 'Failed to download image at http://cdn.example.test/x.png',
    })
  })

  it('reads file urls and bare paths from disk', async () => {
    const root = await mkdtemp(path.join(tmpdir(), 'codefind-fetch-'))
    const filePath = path.join(root, 'thumb.png')
    await writeFile(filePath, new Uint8Array([9, 8, 7]))
    const fetchImpl = vi.fn(async () => new Response(''))
    const fetchThumbnail = createThumbnailFetcher({ fetchImpl })

    expect(Array.from(await fetchThumbnail(pathToFileURL(filePath).href))).toEqual([9, 8, 7])
    expect(Array.from(await fetchThumbnail(filePath))).toEqual([9, 8, 7])
    expect(fetchImpl).not.toHaveBeenCalled()
  })

  it('raises FetchError for a missing file', async () => {
    const fetchThumbnail = createThumbnailFetcher({
      fetchImpl: async () => new Response(''),
      labelFor: () => '0:30',
    })
    await expect(fetchThumbnail('/definitely/not/here.png')).rejects.toMatchObject({
      name: 'FetchError',
      message: 'Failed to read image at 0:30',
    })
  })
})
