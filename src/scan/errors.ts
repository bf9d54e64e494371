type FrameErrorOptions = {
  timestampLabel: string
  cause?: unknown
}

export class FetchError extends Error {
  readonly timestampLabel: string

  constructor(message: string, { timestampLabel, cause }: FrameErrorOptions) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'FetchError'
    this.timestampLabel = timestampLabel
  }
}

export class DecodeError extends Error {
  readonly timestampLabel: string

  constructor(message: string, { timestampLabel, cause }: FrameErrorOptions) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'DecodeError'
    this.timestampLabel = timestampLabel
  }
}

export class CaptureError extends Error {
  readonly timestampLabel: string

  constructor(message: string, { timestampLabel, cause }: FrameErrorOptions) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'CaptureError'
    this.timestampLabel = timestampLabel
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
