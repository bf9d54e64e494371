import { describe, expect, it, vi } from 'vitest'

import { FetchError } from '../src/scan/errors.js'
import { clampWorkers, runScanPool, runWithConcurrency } from '../src/scan/pool.js'
import type { FrameDescriptor, ScanEvent } from '../src/scan/types.js'
import { fakeOcr, fakePng } from './helpers.js'

const slides: Record<string, string> = {
  'thumb://1': 'Intro to systems',
  'thumb://2': 'Attendance code\nLUT DESERT',
  'thumb://3': 'Clicker question\nRIVER',
  'thumb://4': 'Summary',
}

const descriptors: FrameDescriptor[] = [
  { locator: 'thumb://1', timestampLabel: '0:10' },
  { locator: 'thumb://2', timestampLabel: '5:00' },
  { locator: 'thumb://3', timestampLabel: '12:34' },
  { locator: 'thumb://4', timestampLabel: '40:00' },
]

function fetchSlide(locator: string): Promise<Uint8Array> {
  const text = slides[locator]
  if (text === undefined) return Promise.reject(new Error(`unknown ${locator}`))
  return Promise.resolve(fakePng(text))
}

describe('clampWorkers', () => {
  it('keeps the limit inside 1-16', () => {
    expect(clampWorkers(0)).toBe(1)
    expect(clampWorkers(40)).toBe(16)
    expect(clampWorkers(3.4)).toBe(3)
    expect(clampWorkers(Number.NaN)).toBe(5)
  })
})

describe('runWithConcurrency', () => {
  it('never exceeds the worker limit and keeps task order', async () => {
    let inFlight = 0
    let maxInFlight = 0
    const tasks = Array.from({ length: 9 }, (_, index) => async () => {
      inFlight += 1
      maxInFlight = Math.max(maxInFlight, inFlight)
      await new Promise((resolve) => setTimeout(resolve, 9 - index))
      inFlight -= 1
      return index * 2
    })

    const results = await runWithConcurrency(tasks, 3)

    expect(results).toEqual([0, 2, 4, 6, 8, 10, 12, 14, 16])
    expect(maxInFlight).toBe(3)
  })

  it('reports progress once per task', async () => {
    const onProgress = vi.fn()
    await runWithConcurrency([async () => 1, async () => 2], 5, onProgress)
    expect(onProgress).toHaveBeenCalledTimes(2)
    expect(onProgress).toHaveBeenLastCalledWith(2, 2, expect.any(Number))
  })

  it('returns an empty list for no tasks', async () => {
    expect(await runWithConcurrency([], 4)).toEqual([])
  })
})

describe('runScanPool', () => {
  it('finds the same codes with one worker or five', async () => {
    const serial = await runScanPool({
      descriptors,
      fetch: fetchSlide,
      ocr: fakeOcr(),
      workers: 1,
    })
    const parallel = await runScanPool({
      descriptors,
      fetch: fetchSlide,
      ocr: fakeOcr(),
      workers: 5,
    })

    const describeOutcomes = (outcomes: typeof serial.outcomes) =>
      outcomes.map((outcome) => [outcome.timestampLabel, Array.from(outcome.codes)])
    expect(describeOutcomes(serial.outcomes)).toEqual([
      ['5:00', ['LUT DESERT']],
      ['12:34', ['RIVER']],
    ])
    expect(describeOutcomes(parallel.outcomes)).toEqual(describeOutcomes(serial.outcomes))
    expect(serial.outcomes[0]?.sourceImageRef).toBe('thumb://2')
  })

  it('isolates a failing download from the other frames', async () => {
    const events: ScanEvent[] = []
    const fetch = async (locator: string) => {
      if (locator === 'thumb://2') {
        throw new FetchError('Failed to download image at 5:00: 404', { timestampLabel: '5:00' })
      }
      return await fetchSlide(locator)
    }

    const result = await runScanPool({
      descriptors,
      fetch,
      ocr: fakeOcr(),
      workers: 2,
      onEvent: (event) => events.push(event),
    })

    expect(result.failedFrames).toBe(1)
    expect(result.outcomes.map((outcome) => Array.from(outcome.codes))).toEqual([['RIVER']])
    const failures = events.filter((event) => event.type === 'frame-error')
    expect(failures).toHaveLength(1)
    expect(failures[0]).toMatchObject({
      type: 'frame-error',
      phase: 'thumbnail',
      timestampLabel: '5:00',
    })
  })

  it('treats undecodable bytes as a failed frame without calling OCR', async () => {
    const ocr = fakeOcr()
    const result = await runScanPool({
      descriptors: [{ locator: 'thumb://broken', timestampLabel: '1:00' }],
      fetch: async () => new TextEncoder().encode('<html>not an image</html>'),
      ocr,
    })

    expect(result).toEqual({ outcomes: [], failedFrames: 1 })
    expect(ocr.calls).toBe(0)
  })

  it('emits a frame event per descriptor and a code event per code', async () => {
    const events: ScanEvent[] = []
    await runScanPool({
      descriptors,
      fetch: fetchSlide,
      ocr: fakeOcr(),
      workers: 1,
      onEvent: (event) => events.push(event),
    })

    expect(events.filter((event) => event.type === 'frame').map((event) => event.type)).toEqual([
      'frame',
      'frame',
      'frame',
      'frame',
    ])
    expect(events.filter((event) => event.type === 'code')).toEqual([
      { type: 'code', phase: 'thumbnail', code: 'LUT DESERT', timestampLabel: '5:00' },
      { type: 'code', phase: 'thumbnail', code: 'RIVER', timestampLabel: '12:34' },
    ])
    expect(events.at(-1)).toEqual({
      type: 'frame',
      phase: 'thumbnail',
      timestampLabel: '40:00',
      completed: 4,
      total: 4,
    })
  })

  it('keeps scanning when a listener throws', async () => {
    const result = await runScanPool({
      descriptors,
      fetch: fetchSlide,
      ocr: fakeOcr(),
      onEvent: () => {
        throw new Error('listener broke')
      },
    })
    expect(result.outcomes).toHaveLength(2)
  })
})
