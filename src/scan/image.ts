import { DecodeError } from './errors.js'
import type { ImageKind } from './types.js'

const SIGNATURES: Array<{ kind: ImageKind; bytes: number[]; offset?: number }> = [
  { kind: 'png', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { kind: 'jpeg', bytes: [0xff, 0xd8, 0xff] },
  { kind: 'gif', bytes: [0x47, 0x49, 0x46, 0x38] },
  { kind: 'bmp', bytes: [0x42, 0x4d] },
  // RIFF....WEBP
  { kind: 'webp', bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 },
]

export function sniffImageKind(bytes: Uint8Array): ImageKind | null {
  for (const signature of SIGNATURES) {
    const offset = signature.offset ?? 0
    if (bytes.length < offset + signature.bytes.length) continue
    if (signature.bytes.every((byte, index) => bytes[offset + index] === byte)) {
      return signature.kind
    }
  }
  return null
}

export function assertImage(bytes: Uint8Array, timestampLabel: string): ImageKind {
  if (bytes.length === 0) {
    throw new DecodeError(`Empty image at ${timestampLabel}`, { timestampLabel })
  }
  const kind = sniffImageKind(bytes)
  if (!kind) {
    throw new DecodeError(`Unrecognized image data at ${timestampLabel}`, { timestampLabel })
  }
  return kind
}
