import * as cheerio from 'cheerio'
import type { CheerioAPI } from 'cheerio'
import { MIN_READABLE_LENGTH } from '../constants.js'
import { logger } from '../utils/logger.js'

// Constants

// Social, video, code hosting, auth-walled docs and paywalled news. Extraction from these yields nothing useful.
export const BLOCKED_DOMAINS: ReadonlySet<string> = new Set([
  'twitter.com',
  'x.com',
  'reddit.com',
  'old.reddit.com',
  'facebook.com',
  'instagram.com',
  'youtube.com',
  'youtu.be',
  'vimeo.com',
  'tiktok.com',
  'github.com',
  'gitlab.com',
  'bitbucket.org',
  'docs.google.com',
  'drive.google.com',
  'sheets.google.com',
  'medium.com',
  'bloomberg.com',
  'wsj.com',
  'nytimes.com',
  'ft.com',
  'economist.com',
  'washingtonpost.com',
  'linkedin.com'
])

export const BLOCKED_EXTENSIONS: readonly string[] = [
  // Documents
  '.pdf',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
  '.ppt',
  '.pptx',
  // Archives
  '.zip',
  '.tar',
  '.gz',
  '.rar',
  '.7z',
  // Media
  '.mp4',
  '.mp3',
  '.wav',
  '.avi',
  '.mov',
  '.mkv',
  '.webm',
  // Images
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.svg',
  '.webp',
  '.bmp',
  '.ico'
]

const REMOVE_TAGS = ['script', 'style', 'nav', 'header', 'footer', 'aside', 'iframe', 'noscript', 'svg', 'form', 'button']

const BLOCK_TAGS = [
  'address',
  'article',
  'blockquote',
  'br',
  'dd',
  'div',
  'dl',
  'dt',
  'figcaption',
  'figure',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'hr',
  'li',
  'main',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'td',
  'th',
  'tr',
  'ul'
]

const CONTENT_PATTERN = /content|post|article|entry|story/i

const log = logger.child('content-filter')

// Types

export interface SkipDecision {
  skip: boolean
  reason: string
}

// Helpers

function urlPath(url: string): string {
  try {
    return new URL(url).pathname
  } catch {
    return url.split(/[?#]/)[0] ?? ''
  }
}

// parse5 follows the HTML standard strictly. htmlparser2 accepts nearly anything, so it is the fallback.
function loadDocument(html: string): CheerioAPI | null {
  try {
    return cheerio.load(html)
  } catch (error) {
    log.debug('Default HTML parser failed, trying lenient parser', { error: String(error) })
  }

  try {
    return cheerio.load(html, { xml: { xmlMode: false } })
  } catch (error) {
    log.warn('Failed to parse HTML', { error: String(error) })

    return null
  }
}

function findMainContent($: CheerioAPI) {
  const candidates = [
    $('article').first(),
    $('main').first(),
    $('[class]')
      .filter((_, element) => CONTENT_PATTERN.test($(element).attr('class') ?? ''))
      .first(),
    $('[id]')
      .filter((_, element) => CONTENT_PATTERN.test($(element).attr('id') ?? ''))
      .first(),
    $('body').first()
  ]

  return candidates.find(candidate => candidate.length > 0) ?? null
}

export function cleanText(text: string): string {
  return text
    .split('\n')
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n')
}

// Main Functions

export function extractDomain(url: string): string | null {
  try {
    const host = new URL(url).host.toLowerCase()

    if (!host) return null

    return host.startsWith('www.') ? host.slice(4) : host
  } catch {
    return null
  }
}

export function shouldSkip(url: string | null | undefined): SkipDecision {
  if (!url) return { skip: true, reason: 'No URL provided' }

  const domain = extractDomain(url)

  if (domain && BLOCKED_DOMAINS.has(domain)) {
    return { skip: true, reason: `Blocked domain: ${domain}` }
  }

  const path = urlPath(url).toLowerCase()
  const extension = BLOCKED_EXTENSIONS.find(ext => path.endsWith(ext))

  if (extension) {
    return { skip: true, reason: `Blocked file type: ${extension}` }
  }

  return { skip: false, reason: '' }
}

// Returns null for pages whose cleaned text is too short to be worth summarizing.
export function extractReadableText(html: string): string | null {
  const $ = loadDocument(html)

  if (!$) return null

  $(REMOVE_TAGS.join(',')).remove()

  const main = findMainContent($)

  if (!main) return null

  main.find(BLOCK_TAGS.join(',')).after('\n')

  const cleaned = cleanText(main.text())

  if (cleaned.length < MIN_READABLE_LENGTH) return null

  return cleaned
}

// Prefers the last sentence or line break in the back half of the window. Falls back to a hard cut.
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text

  const truncated = text.slice(0, maxLength)
  const boundary = Math.max(truncated.lastIndexOf('. '), truncated.lastIndexOf('\n'))

  if (boundary > Math.floor(maxLength / 2)) {
    return truncated.slice(0, boundary + 1).trim()
  }

  return truncated.trim()
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length
}
