import { type CheerioAPI, load } from 'cheerio'

import type {
  CatalogProvider,
  FrameDescriptor,
  NavigationPoint,
  VideoLocation,
} from '../scan/types.js'

const UNKNOWN_TIMESTAMP = 'unknown'
const TIMESTAMP_SELECTOR = 'div.thumbnail-timestamp'
const PLAYER_SELECTOR = '.panopto-player'

export function parseTimestampLabel(label: string): number | null {
  const parts = label.trim().split(':')
  if (parts.length < 2 || parts.length > 3) return null
  if (!parts.every((part) => /^\d+$/.test(part))) return null
  const [first, second, third] = parts.map(Number)
  if (first === undefined || second === undefined) return null
  if (third === undefined) return first * 60 + second
  return first * 3600 + second * 60 + third
}

export function resolveLocator(raw: string, baseUrl: string | null): string {
  const trimmed = raw.trim()
  if (!baseUrl) return trimmed
  try {
    return new URL(trimmed, baseUrl).toString()
  } catch {
    return trimmed
  }
}

function listThumbnailsFrom($: CheerioAPI, baseUrl: string | null): FrameDescriptor[] {
  const descriptors: FrameDescriptor[] = []
  $('img[data-src]').each((_index, element) => {
    const img = $(element)
    const src = img.attr('data-src')?.trim()
    if (!src) return
    const parent = img.parent()
    const label = parent.is('li') ? parent.find(TIMESTAMP_SELECTOR).first().text().trim() : ''
    descriptors.push({
      locator: resolveLocator(src, baseUrl),
      timestampLabel: label || UNKNOWN_TIMESTAMP,
    })
  })
  return descriptors
}

function listNavigationPointsFrom($: CheerioAPI): NavigationPoint[] {
  const seen = new Set<string>()
  const points: NavigationPoint[] = []
  $('li.thumbnail').each((_index, element) => {
    const label = $(element).find(TIMESTAMP_SELECTOR).first().text().trim()
    if (!label) return
    const offsetSeconds = parseTimestampLabel(label)
    if (offsetSeconds == null) return
    const key = `${offsetSeconds}\u0000${label}`
    if (seen.has(key)) return
    seen.add(key)
    points.push({ offsetSeconds, timestampLabel: label })
  })
  return points.sort((a, b) => a.offsetSeconds - b.offsetSeconds)
}

function findVideoSource($: CheerioAPI, scope: string): string | null {
  const direct = $(`${scope} video[src]`).first().attr('src')?.trim()
  if (direct) return direct
  const nested = $(`${scope} video source[src]`).first().attr('src')?.trim()
  return nested || null
}

function locateVideoFrom($: CheerioAPI, baseUrl: string | null): VideoLocation | null {
  const fromPlayer = findVideoSource($, PLAYER_SELECTOR)
  if (fromPlayer) return { src: resolveLocator(fromPlayer, baseUrl), via: 'player' }
  const fromVideo = findVideoSource($, 'body')
  if (fromVideo) return { src: resolveLocator(fromVideo, baseUrl), via: 'video' }
  return null
}

/**
 * Reads the thumbnail strip of a lecture viewer page:
 *
 * ```html
 * <li class="thumbnail">
 *   <img data-src="https://cdn.example.test/thumb/12.jpg" />
 *   <div class="thumbnail-timestamp">12:34</div>
 * </li>
 * ```
 *
 * The last parsed document is kept, so asking one page for its thumbnails, navigation
 * points and video parses it once.
 */
export function createViewerCatalog({
  baseUrl = null,
}: { baseUrl?: string | null } = {}): CatalogProvider {
  let parsed: { markup: string; $: CheerioAPI } | null = null
  const parse = (markup: string): CheerioAPI => {
    if (parsed?.markup === markup) return parsed.$
    const $ = load(markup)
    parsed = { markup, $ }
    return $
  }

  return {
    listThumbnails: (markup) => listThumbnailsFrom(parse(markup), baseUrl),
    listNavigationPoints: (markup) => listNavigationPointsFrom(parse(markup)),
    locateVideo: (markup) => locateVideoFrom(parse(markup), baseUrl),
  }
}
