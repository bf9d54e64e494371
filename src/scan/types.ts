export type ScanPhase = 'thumbnail' | 'video'

export type FrameDescriptor = {
  readonly locator: string
  readonly timestampLabel: string
}

export type NavigationPoint = {
  readonly offsetSeconds: number
  readonly timestampLabel: string
}

export type RecognizedCode = {
  timestampLabel: string
  codeText: string
  sourceImageRef: string
}

export type ScanOutcome = {
  timestampLabel: string
  codes: Set<string>
  sourceImageRef: string
}

export type ImageKind = 'png' | 'jpeg' | 'gif' | 'webp' | 'bmp'

export type VideoLocation = {
  src: string
  via: 'player' | 'video'
}

export type CatalogProvider = {
  listThumbnails: (markup: string) => FrameDescriptor[]
  listNavigationPoints: (markup: string) => NavigationPoint[]
  locateVideo: (markup: string) => VideoLocation | null
}

/**
 * A single, stateful video player. Calls must not interleave: the controller seeks,
 * settles and captures one navigation point at a time.
 */
export type VideoPlayer = {
  label: string
  seek: (offsetSeconds: number) => Promise<void>
  capture: () => Promise<Uint8Array>
  /** Resolves once the frame at the last seek position is renderable. Replaces the settle sleep. */
  waitForFrame?: (() => Promise<void>) | null
}

export type FrameSource = {
  fetchByLocator: (locator: string) => Promise<Uint8Array>
  locatePlayer: () => Promise<VideoPlayer | null>
}

export type OcrEngine = {
  extractText: (image: Uint8Array) => Promise<string>
}

/** One code as read off one frame; the unit the archive stores. */
export type ArchiveEntry = RecognizedCode & {
  phase: ScanPhase
  image: Uint8Array
  kind: ImageKind
}

export type CodeArchive = {
  save: (entry: ArchiveEntry) => Promise<string>
}

export type ScanEvent =
  | { type: 'phase'; phase: ScanPhase }
  | { type: 'frame'; phase: ScanPhase; timestampLabel: string; completed: number; total: number }
  | { type: 'frame-error'; phase: ScanPhase; timestampLabel: string; error: Error }
  | { type: 'code'; phase: ScanPhase; code: string; timestampLabel: string }
  | { type: 'video-skipped'; reason: string }

export type ScanEventListener = (event: ScanEvent) => void

export type ExtractionReport = {
  codes: Set<string>
  phase: ScanPhase | null
  outcomes: ScanOutcome[]
  failedFrames: number
  videoSkipped: boolean
}
