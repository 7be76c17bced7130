import { DEFAULT_BATCH_SIZE } from '../constants.js'
import { errorMessage, SummarizerApiError, SummarizerRateLimitError } from '../errors.js'
import type { ArticleSummary, ExtractedArticle, SummarizedArticle } from '../types.js'
import { ArticleSummarySchema, displayContent, SUMMARIZATION_STATUS } from '../types.js'
import { logger } from '../utils/logger.js'

const log = logger.child('summarizer')

// Types

// One call per chunk. Resolves with the raw entries positionally matched to `articles`.
export interface SummaryBackend {
  summarize(articles: readonly ExtractedArticle[]): Promise<unknown[]>
}

export interface SummarizationAdapterOptions {
  batchSize?: number
  cache?: SummaryCache | null
}

export type ArticleSummarizer = Pick<SummarizationAdapter, 'summarizeBatch'>

// Cache

export class SummaryCache {
  private readonly entries = new Map<string, ArticleSummary>()

  private static key(article: ExtractedArticle, content: string): string {
    return `${article.storyId}\u0000${content}`
  }

  get(article: ExtractedArticle): ArticleSummary | undefined {
    const content = displayContent(article)

    return content ? this.entries.get(SummaryCache.key(article, content)) : undefined
  }

  set(article: ExtractedArticle, summary: ArticleSummary): void {
    const content = displayContent(article)

    if (content) this.entries.set(SummaryCache.key(article, content), summary)
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
  }
}

export const sharedSummaryCache = new SummaryCache()

// Helpers

function failed(
  article: ExtractedArticle,
  status: 'no_content' | 'api_error' | 'parse_error',
  message: string | null
): SummarizedArticle {
  return { article, status, summary: null, errorMessage: message }
}

function succeeded(article: ExtractedArticle, summary: ArticleSummary, status: 'success' | 'cached'): SummarizedArticle {
  return { article, status, summary, errorMessage: null }
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []

  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }

  return chunks
}

// Main Class

export class SummarizationAdapter {
  private readonly batchSize: number
  private readonly cache: SummaryCache | null

  constructor(
    private readonly backend: SummaryBackend,
    options: SummarizationAdapterOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
    this.cache = options.cache ?? null

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`)
    }
  }

  private mapEntry(article: ExtractedArticle, entry: unknown): SummarizedArticle {
    if (entry === undefined || entry === null) {
      return failed(article, SUMMARIZATION_STATUS.parse_error, 'Missing summary in batch response')
    }

    const parsed = ArticleSummarySchema.safeParse(entry)

    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const detail = issue ? `${issue.path.join('.') || 'entry'}: ${issue.message}` : parsed.error.message

      return failed(article, SUMMARIZATION_STATUS.parse_error, `Invalid summary in batch response: ${detail}`)
    }

    this.cache?.set(article, parsed.data)

    return succeeded(article, parsed.data, SUMMARIZATION_STATUS.success)
  }

  private async summarizeChunk(articles: readonly ExtractedArticle[]): Promise<SummarizedArticle[]> {
    try {
      const entries = await this.backend.summarize(articles)

      return articles.map((article, index) => this.mapEntry(article, entries[index]))
    } catch (error) {
      const message = errorMessage(error)

      if (error instanceof SummarizerRateLimitError || error instanceof SummarizerApiError) {
        log.warn(`Chunk of ${articles.length} failed with API error`, { error: message })

        return articles.map(article => failed(article, SUMMARIZATION_STATUS.api_error, message))
      }

      log.warn(`Chunk of ${articles.length} failed to parse`, { error: message })

      return articles.map(article => failed(article, SUMMARIZATION_STATUS.parse_error, message))
    }
  }

  // One result per input, in input order. Chunks run one after another.
  async summarizeBatch(articles: readonly ExtractedArticle[], batchSize = this.batchSize): Promise<SummarizedArticle[]> {
    const results: Array<SummarizedArticle | undefined> = new Array(articles.length).fill(undefined)
    const pending: Array<{ article: ExtractedArticle; position: number }> = []

    let cachedCount = 0

    articles.forEach((article, position) => {
      if (!displayContent(article)) {
        results[position] = failed(article, SUMMARIZATION_STATUS.no_content, null)

        return
      }

      const cached = this.cache?.get(article)

      if (cached) {
        results[position] = succeeded(article, cached, SUMMARIZATION_STATUS.cached)
        cachedCount += 1

        return
      }

      pending.push({ article, position })
    })

    const chunks = chunk(pending, Math.max(1, Math.trunc(batchSize)))

    log.info(`Summarizing ${pending.length} articles in ${chunks.length} chunk(s)`, {
      cached: cachedCount
    })

    for (const group of chunks) {
      const summarized = await this.summarizeChunk(group.map(item => item.article))

      group.forEach((item, index) => {
        results[item.position] = summarized[index]
      })
    }

    return results.map(
      (result, position) =>
        result ?? failed(articles[position], SUMMARIZATION_STATUS.parse_error, 'Missing summary in batch response')
    )
  }
}
