import { vi } from 'vitest'
import type { UserProfile, UserProfileInput } from '../src/profile.js'
import { parseUserProfile } from '../src/profile.js'
import type { ArticleSummary, ExtractedArticle, Story, SummarizedArticle } from '../src/types.js'
import { hnItemUrl } from '../src/types.js'

export function makeStory(overrides: Partial<Story> = {}): Story {
  const id = overrides.id ?? 1

  return {
    id,
    title: `Story ${id}`,
    url: `https://example.com/posts/${id}`,
    score: 100,
    by: 'tester',
    time: 1_700_000_000,
    descendants: 10,
    type: 'story',
    kids: [],
    ...overrides
  }
}

export function makeArticle(overrides: Partial<ExtractedArticle> = {}): ExtractedArticle {
  const storyId = overrides.storyId ?? 1

  return {
    storyId,
    title: `Story ${storyId}`,
    url: `https://example.com/posts/${storyId}`,
    hnUrl: hnItemUrl(storyId),
    hnScore: 100,
    hnComments: 10,
    author: 'tester',
    content: `Body text for story ${storyId}.`,
    wordCount: 5,
    status: 'success',
    errorMessage: null,
    domain: 'example.com',
    hnText: null,
    ...overrides
  }
}

export function makeSummary(techTags: string[] = [], summary = 'A concise summary of the article content.'): ArticleSummary {
  return { summary, keyPoints: ['First takeaway'], techTags }
}

export function makeSummarized(
  tags: string[] = [],
  articleOverrides: Partial<ExtractedArticle> = {}
): SummarizedArticle {
  return {
    article: makeArticle(articleOverrides),
    status: 'success',
    summary: makeSummary(tags),
    errorMessage: null
  }
}

export function makeProfile(input: UserProfileInput = {}): UserProfile {
  return parseUserProfile(input)
}

export function rawSummary(index: number, tags: string[] = ['testing']): Record<string, unknown> {
  return {
    index,
    summary: `Summary number ${index} describing the article in enough words.`,
    key_points: [`Point ${index}`],
    tech_tags: tags
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

export function htmlResponse(html: string, status = 200, contentType = 'text/html; charset=utf-8'): Response {
  return new Response(html, { status, headers: { 'content-type': contentType } })
}

export function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input

  return input instanceof URL ? input.href : input.url
}

// Answers after `ms`, or rejects with the signal's reason if it aborts first, the way fetch does.
export function delayedFetch(ms: number, respond: (input: string | URL | Request) => Response) {
  return vi.fn<typeof fetch>(
    (input, init) =>
      new Promise<Response>((resolve, reject) => {
        const signal = init?.signal

        if (signal?.aborted) {
          reject(signal.reason)

          return
        }

        const timer = setTimeout(() => resolve(respond(input)), ms)

        signal?.addEventListener('abort', () => {
          clearTimeout(timer)
          reject(signal.reason)
        })
      })
  )
}

// A response whose body records whether it was cancelled.
export function trackedResponse(status: number, contentType = 'text/html'): { response: Response; cancelled: () => boolean } {
  let cancelled = false

  const body = new ReadableStream<Uint8Array>({
    cancel: () => {
      cancelled = true
    }
  })

  return {
    response: new Response(body, { status, headers: { 'content-type': contentType } }),
    cancelled: () => cancelled
  }
}
