import fs from 'node:fs/promises'
import path from 'node:path'

export type RingFileOptions = {
  filePath: string
  maxBytes: number
  maxFiles: number
  onError?: ((error: unknown) => void) | null
}

export type RingFileWriter = {
  write: (line: string) => void
  flush: () => Promise<void>
}

const normalizeMaxFiles = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1

const normalizeMaxBytes = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1024

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

async function fileSize(filePath: string): Promise<number> {
  try {
    const stat = await fs.stat(filePath)
    return stat.size
  } catch (error) {
    if (isMissingFile(error)) return 0
    throw error
  }
}

async function ignoreMissing(task: Promise<void>): Promise<void> {
  try {
    await task
  } catch (error) {
    if (!isMissingFile(error)) throw error
  }
}

// codefind.jsonl -> codefind.jsonl.1 -> ... -> codefind.jsonl.<maxFiles - 1>
async function rotateFiles(filePath: string, maxFiles: number) {
  if (maxFiles <= 1) {
    await ignoreMissing(fs.truncate(filePath, 0))
    return
  }
  for (let i = maxFiles - 1; i >= 1; i -= 1) {
    const src = i === 1 ? filePath : `${filePath}.${i - 1}`
    const dest = `${filePath}.${i}`
    await ignoreMissing(fs.unlink(dest))
    await ignoreMissing(fs.rename(src, dest))
  }
}

/**
 * Appends lines to a size-capped file, rotating into numbered siblings. Writes are queued
 * so lines keep their order; `flush` resolves after everything queued so far is on disk.
 */
export function createRingFileWriter(options: RingFileOptions): RingFileWriter {
  const filePath = options.filePath
  const maxBytes = normalizeMaxBytes(options.maxBytes)
  const maxFiles = normalizeMaxFiles(options.maxFiles)
  const onError = options.onError ?? ((error: unknown) => process.emitWarning(String(error)))
  let dirReady = false
  let chain: Promise<void> = Promise.resolve()

  const enqueue = (task: () => Promise<void>) => {
    chain = chain.then(task).catch(onError)
  }

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(normalized, 'utf8')
    enqueue(async () => {
      if (!dirReady) {
        await fs.mkdir(path.dirname(filePath), { recursive: true })
        dirReady = true
      }
      const currentSize = await fileSize(filePath)
      if (currentSize > 0 && currentSize + bytes > maxBytes) {
        await rotateFiles(filePath, maxFiles)
      }
      await fs.appendFile(filePath, normalized, 'utf8')
    })
  }

  const flush = async () => await chain

  return { write, flush }
}
