import pLimit from 'p-limit'
import type { LimitFunction } from 'p-limit'
import { z } from 'zod'
import { DEFAULT_MAX_CONCURRENT, HN_API_BASE_URL, HN_API_TIMEOUT_MS, MAX_ATTEMPTS, USER_AGENT } from '../constants.js'
import { errorMessage, HnApiError, HnClientError, HnTimeoutError, HnTransportError, ScopeError } from '../errors.js'
import type { Story, StoryType } from '../types.js'
import { storyEndpoint, StorySchema } from '../types.js'
import { logger } from '../utils/logger.js'
import { fetchWithRetry, isTimeoutError, isTransportError } from '../utils/retry.js'

// Constants

const MAX_ID_FETCH = 100

const INCLUDED_ITEM_TYPES = new Set(['story', 'job'])

const StoryIdsSchema = z.array(z.number().int())

const log = logger.child('hn')

// Types

export interface HnClientOptions {
  baseUrl?: string
  timeoutMs?: number
  maxAttempts?: number
  maxConcurrent?: number
  minBackoffMs?: number
  fetch?: typeof fetch
}

// The slice of the client the pipeline depends on. Tests substitute their own.
export interface StorySource {
  fetchStories(type: StoryType, limit: number, minScore?: number): Promise<Story[]>
}

// Main Class

export class HnClient implements StorySource {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly maxAttempts: number
  private readonly maxConcurrent: number
  private readonly minBackoffMs: number | undefined
  private readonly fetchFn: typeof fetch
  private limit: LimitFunction | null = null

  constructor(options: HnClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? HN_API_BASE_URL).replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? HN_API_TIMEOUT_MS
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT
    this.minBackoffMs = options.minBackoffMs
    this.fetchFn = options.fetch ?? fetch
  }

  static async use<T>(options: HnClientOptions, fn: (client: HnClient) => Promise<T>): Promise<T> {
    const client = new HnClient(options).open()

    try {
      return await fn(client)
    } finally {
      client.close()
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
    if (!this.limit) throw new ScopeError('HnClient')

    return this.limit
  }

  // Returns the parsed body, or null for a 404.
  private async getJson(path: string): Promise<unknown> {
    const limit = this.requireLimit()
    const url = `${this.baseUrl}${path}`

    let response: Response

    try {
      response = await fetchWithRetry(url, {
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
        timeoutMs: this.timeoutMs,
        maxAttempts: this.maxAttempts,
        minDelayMs: this.minBackoffMs,
        fetch: this.fetchFn,
        limit
      })
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new HnTimeoutError(`Request to ${url} timed out`, { cause: error })
      }

      if (isTransportError(error)) {
        throw new HnTransportError(`Transport error for ${url}: ${errorMessage(error)}`, { cause: error })
      }

      throw new HnClientError(`Request to ${url} failed: ${errorMessage(error)}`, { cause: error })
    }

    if (response.status === 404) {
      await response.body?.cancel()

      return null
    }

    if (!response.ok) {
      await response.body?.cancel()

      throw new HnApiError(response.status, response.statusText || `request to ${path} failed`)
    }

    try {
      return await response.json()
    } catch (error) {
      throw new HnClientError(`Invalid JSON from ${url}`, { cause: error })
    }
  }

  async fetchStoryIds(type: StoryType, limit: number): Promise<number[]> {
    const body = await this.getJson(storyEndpoint(type))
    const parsed = StoryIdsSchema.safeParse(body)

    if (!parsed.success) {
      log.warn(`Unexpected ${type} stories response`, { issue: parsed.error.issues[0]?.message })

      return []
    }

    return parsed.data.slice(0, limit)
  }

  async fetchStory(id: number): Promise<Story | null> {
    const body = await this.getJson(`/item/${id}.json`)

    if (body === null) return null

    const parsed = StorySchema.safeParse(body)

    if (!parsed.success) {
      log.debug(`Item ${id} is not a valid story`, { issue: parsed.error.issues[0]?.message })

      return null
    }

    const story = parsed.data

    if (story.dead || story.deleted) return null

    if (!INCLUDED_ITEM_TYPES.has(story.type)) return null

    return story
  }

  // Over-fetches ids when a score floor is set, since some stories will fall below it.
  async fetchStories(type: StoryType, limit: number, minScore = 0): Promise<Story[]> {
    const idLimit = minScore > 0 ? Math.min(limit * 2, MAX_ID_FETCH) : limit
    const ids = await this.fetchStoryIds(type, idLimit)

    log.info(`Fetching ${ids.length} ${type} stories`)

    const settled = await Promise.allSettled(ids.map(id => this.fetchStory(id)))

    const stories: Story[] = []

    settled.forEach((result, index) => {
      if (result.status === 'rejected') {
        log.warn(`Failed to fetch story ${ids[index]}`, { error: errorMessage(result.reason) })

        return
      }

      const story = result.value

      if (story && story.score >= minScore) stories.push(story)
    })

    // Array.prototype.sort is stable, so equal scores keep HN's ordering.
    stories.sort((a, b) => b.score - a.score)

    log.info(`Fetched ${Math.min(stories.length, limit)} stories`, { candidates: ids.length })

    return stories.slice(0, limit)
  }
}
