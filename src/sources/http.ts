import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'

import { FetchError } from '../scan/errors.js'

export const DEFAULT_FRAME_TIMEOUT_MS = 30_000

function isHttpUrl(locator: string): boolean {
  return /^https?:\/\//i.test(locator)
}

function toFilePath(locator: string): string {
  return locator.startsWith('file:') ? fileURLToPath(locator) : locator
}

/**
 * Loads thumbnail bytes. http(s) locators go through `fetch`; `file:` URLs and bare
 * paths are read from disk. Every failure surfaces as `FetchError`.
 */
export function createThumbnailFetcher({
  fetchImpl,
  timeoutMs = DEFAULT_FRAME_TIMEOUT_MS,
  labelFor,
}: {
  fetchImpl: typeof fetch
  timeoutMs?: number
  labelFor?: ((locator: string) => string) | null
}): (locator: string) => Promise<Uint8Array> {
  return async (locator) => {
    const timestampLabel = labelFor?.(locator) ?? locator
    if (!isHttpUrl(locator)) {
      try {
        return new Uint8Array(await readFile(toFilePath(locator)))
      } catch (error) {
        throw new FetchError(`Failed to read image at ${timestampLabel}`, {
          timestampLabel,
          cause: error,
        })
      }
    }

    let response: Response
    try {
      response = await fetchImpl(locator, { signal: AbortSignal.timeout(timeoutMs) })
    } catch (error) {
      throw new FetchError(`Failed to download image at ${timestampLabel}`, {
        timestampLabel,
        cause: error,
      })
    }
    if (!response.ok) {
      throw new FetchError(`Failed to download image at ${timestampLabel}: ${response.status}`, {
        timestampLabel,
      })
    }
    try {
      return new Uint8Array(await response.arrayBuffer())
    } catch (error) {
      throw new FetchError(`Failed to read image body at ${timestampLabel}`, {
        timestampLabel,
        cause: error,
      })
    }
  }
}
