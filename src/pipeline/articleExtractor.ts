import pLimit from 'p-limit'
import type { LimitFunction } from 'p-limit'
import {
  ARTICLE_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENT,
  MAX_ATTEMPTS,
  MAX_CONTENT_LENGTH,
  USER_AGENT
} from '../constants.js'
import { errorMessage, ScopeError } from '../errors.js'
import type { ExtractedArticle, ExtractionStatus, Story } from '../types.js'
import { EXTRACTION_STATUS, hnItemUrl } from '../types.js'
import { logger } from '../utils/logger.js'
import { fetchWithRetry, isTimeoutError, isTransportError } from '../utils/retry.js'
import { countWords, extractDomain, extractReadableText, shouldSkip, truncateText } from './contentFilter.js'

// Constants

const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent': USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5'
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml']

const log = logger.child('extractor')

// Types

export interface ArticleExtractorOptions {
  timeoutMs?: number
  maxAttempts?: number
  maxConcurrent?: number
  maxContentLength?: number
  minBackoffMs?: number
  fetch?: typeof fetch
}

// The slice of the extractor a pipeline branch depends on.
export interface ArticleSource {
  extractOne(story: Story): Promise<ExtractedArticle>
}

type PageResult = { ok: true; text: string | null } | { ok: false; reason: string }

// Helpers

function failureReason(error: unknown): string {
  if (isTimeoutError(error)) return 'Request timed out'

  if (isTransportError(error)) {
    const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : errorMessage(error)

    return `Transport error: ${cause}`
  }

  const message = errorMessage(error)

  return message.length > 200 ? `${message.slice(0, 200)}…` : message
}

function isHtml(contentType: string): boolean {
  const lower = contentType.toLowerCase()

  return HTML_CONTENT_TYPES.some(type => lower.includes(type))
}

export function createArticle(
  story: Story,
  status: ExtractionStatus,
  fields: { content?: string | null; wordCount?: number; errorMessage?: string | null } = {}
): ExtractedArticle {
  return {
    storyId: story.id,
    title: story.title,
    url: story.url ?? null,
    hnUrl: hnItemUrl(story.id),
    hnScore: story.score,
    hnComments: story.descendants ?? 0,
    author: story.by,
    content: status === EXTRACTION_STATUS.success ? (fields.content ?? null) : null,
    wordCount: fields.wordCount ?? 0,
    status,
    errorMessage: fields.errorMessage ?? null,
    domain: story.url ? extractDomain(story.url) : null,
    hnText: story.text ?? null
  }
}

// Main Class

export class ArticleExtractor implements ArticleSource {
  private readonly timeoutMs: number
  private readonly maxAttempts: number
  private readonly maxConcurrent: number
  private readonly maxContentLength: number
  private readonly minBackoffMs: number | undefined
  private readonly fetchFn: typeof fetch
  private limit: LimitFunction | null = null

  constructor(options: ArticleExtractorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? ARTICLE_FETCH_TIMEOUT_MS
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT
    this.maxContentLength = options.maxContentLength ?? MAX_CONTENT_LENGTH
    this.minBackoffMs = options.minBackoffMs
    this.fetchFn = options.fetch ?? fetch
  }

  // Opens an extractor, hands it to `fn`, and closes it however `fn` exits.
  static async use<T>(options: ArticleExtractorOptions, fn: (extractor: ArticleExtractor) => Promise<T>): Promise<T> {
    const extractor = new ArticleExtractor(options).open()

    try {
      return await fn(extractor)
    } finally {
      extractor.close()
    }
  }

  get isOpen(): boolean {
    return this.limit !== null
  }

  open(): this {
    this.limit ??= pLimit(this.maxConcurrent)

    return this
  }

  close(): void {
    this.limit?.clearQueue()
    this.limit = null
  }

  private requireLimit(): LimitFunction {
    if (!this.limit) throw new ScopeError('ArticleExtractor')

    return this.limit
  }

  // Every attempt takes a slot, so retries count against the concurrency bound too.
  private async fetchPage(url: string): Promise<PageResult> {
    const limit = this.requireLimit()

    let response: Response

    try {
      response = await fetchWithRetry(url, {
        headers: BROWSER_HEADERS,
        timeoutMs: this.timeoutMs,
        maxAttempts: this.maxAttempts,
        minDelayMs: this.minBackoffMs,
        fetch: this.fetchFn,
        limit
      })
    } catch (error) {
      log.warn('Fetch failed', { url, reason: failureReason(error) })

      return { ok: false, reason: failureReason(error) }
    }

    if (!response.ok) {
      log.warn(`HTTP ${response.status} fetching ${url}`)

      await response.body?.cancel()

      return { ok: false, reason: `HTTP ${response.status}` }
    }

    const contentType = response.headers.get('content-type') ?? ''

    if (!isHtml(contentType)) {
      log.debug('Non-HTML content type', { url, contentType })

      await response.body?.cancel()

      return { ok: true, text: null }
    }

    const text = extractReadableText(await response.text())

    return { ok: true, text: text === null ? null : truncateText(text, this.maxContentLength) }
  }

  async extractOne(story: Story): Promise<ExtractedArticle> {
    this.requireLimit()

    if (!story.url) {
      log.debug(`Story ${story.id} has no external URL`)

      return createArticle(story, EXTRACTION_STATUS.no_url, {
        wordCount: story.text ? countWords(story.text) : 0
      })
    }

    const decision = shouldSkip(story.url)

    if (decision.skip) {
      log.debug(`Skipping story ${story.id}: ${decision.reason}`)

      return createArticle(story, EXTRACTION_STATUS.skipped, { errorMessage: decision.reason })
    }

    const page = await this.fetchPage(story.url)

    if (!page.ok) {
      return createArticle(story, EXTRACTION_STATUS.failed, { errorMessage: page.reason })
    }

    if (page.text === null) {
      return createArticle(story, EXTRACTION_STATUS.empty, { errorMessage: 'No content could be extracted' })
    }

    const wordCount = countWords(page.text)

    log.debug(`Extracted ${wordCount} words from story ${story.id}`)

    return createArticle(story, EXTRACTION_STATUS.success, { content: page.text, wordCount })
  }

  // Same length and order as `stories`. A rejected extraction becomes a failed record for that story.
  async extractMany(stories: readonly Story[]): Promise<ExtractedArticle[]> {
    this.requireLimit()

    if (stories.length === 0) return []

    log.info(`Extracting ${stories.length} articles`)

    const settled = await Promise.allSettled(stories.map(story => this.extractOne(story)))

    const articles = settled.map((result, index) => {
      if (result.status === 'fulfilled') return result.value

      const story = stories[index]

      log.warn(`Exception extracting story ${story.id}`, { error: errorMessage(result.reason) })

      return createArticle(story, EXTRACTION_STATUS.failed, { errorMessage: errorMessage(result.reason) })
    })

    const counts = countByStatus(articles)

    log.info(`Extracted ${articles.length} articles`, counts)

    return articles
  }
}

export function countByStatus(articles: readonly ExtractedArticle[]): Record<ExtractionStatus, number> {
  const counts: Record<ExtractionStatus, number> = {
    success: 0,
    skipped: 0,
    failed: 0,
    paywalled: 0,
    no_url: 0,
    empty: 0
  }

  for (const article of articles) counts[article.status] += 1

  return counts
}
