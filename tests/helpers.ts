import { Writable } from 'node:stream'

import type { OcrEngine, VideoPlayer } from '../src/scan/types.js'

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]

/** A "PNG" whose payload after the signature is the text the fake OCR will read back. */
export function fakePng(text: string): Uint8Array {
  const body = new TextEncoder().encode(text)
  const bytes = new Uint8Array(PNG_SIGNATURE.length + body.length)
  bytes.set(PNG_SIGNATURE, 0)
  bytes.set(body, PNG_SIGNATURE.length)
  return bytes
}

type FakeOcr = OcrEngine & { calls: number }

export function fakeOcr(): FakeOcr {
  const engine: FakeOcr = {
    calls: 0,
    extractText: async (image: Uint8Array) => {
      engine.calls += 1
      return new TextDecoder().decode(image.subarray(PNG_SIGNATURE.length))
    },
  }
  return engine
}

type FakePlayer = VideoPlayer & { seeks: number[]; waits: number }

/** Player that returns `frames[offset]` for the last seek; an Error entry is thrown. */
export function fakePlayer(
  frames: Record<number, Uint8Array | Error>,
  { readiness = false }: { readiness?: boolean } = {}
): FakePlayer {
  let position = -1
  const player: FakePlayer = {
    label: 'fake-video',
    seeks: [],
    waits: 0,
    seek: async (offsetSeconds: number) => {
      position = offsetSeconds
      player.seeks.push(offsetSeconds)
    },
    waitForFrame: readiness
      ? async () => {
          player.waits += 1
        }
      : null,
    capture: async () => {
      const frame = frames[position]
      if (!frame) throw new Error(`no frame at ${position}`)
      if (frame instanceof Error) throw frame
      return frame
    },
  }
  return player
}

export function collectStream(): { stream: Writable; text: () => string } {
  let text = ''
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, text: () => text }
}
